/**
 * Debate Engine Error Taxonomy
 *
 * TransientCallError   - retried inside the gateway, never seen by the controller if recovered
 * PermanentCallError   - aborts the current phase and reaches the run's caller
 * ParseError           - agent output failed structured validation (permanent for that turn)
 * ConfigurationError   - raised before any phase runs
 * InvalidStateError    - programming invariant breach, always fatal
 */

import type { DebatePhase } from './debate.js';

/**
 * Gateway call error codes
 */
export type CallErrorCode =
  | 'rate_limit'        // Rate limit exceeded
  | 'timeout'           // Request timed out
  | 'server_error'      // Server-side error
  | 'network'           // Connection failure
  | 'authentication'    // Authentication failed
  | 'invalid_request'   // Invalid request parameters
  | 'not_found'         // Model or resource not found
  | 'retries_exhausted' // Transient failures outlasted every attempt
  | 'unknown';          // Unknown error

/**
 * Codes that are worth retrying
 */
const TRANSIENT_CODES: ReadonlySet<CallErrorCode> = new Set<CallErrorCode>([
  'rate_limit',
  'timeout',
  'server_error',
  'network',
]);

/**
 * Retryable gateway failure
 */
export class TransientCallError extends Error {
  public readonly kind = 'transient' as const;
  public readonly code: CallErrorCode;
  public readonly statusCode?: number;

  constructor(message: string, code: CallErrorCode, statusCode?: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransientCallError';
    this.code = code;
    this.statusCode = statusCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransientCallError);
    }
  }
}

/**
 * Unrecoverable gateway failure
 */
export class PermanentCallError extends Error {
  public readonly kind = 'permanent' as const;
  public readonly code: CallErrorCode;
  public readonly statusCode?: number;
  /** Number of attempts made before giving up */
  public readonly attempts: number;

  constructor(
    message: string,
    code: CallErrorCode,
    options: { statusCode?: number; attempts?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'PermanentCallError';
    this.code = code;
    this.statusCode = options.statusCode;
    this.attempts = options.attempts ?? 1;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, PermanentCallError);
    }
  }
}

export type CallError = TransientCallError | PermanentCallError;

/**
 * Agent output could not be mapped to the expected structure
 */
export class ParseError extends Error {
  public readonly issues: string[];
  public readonly rawOutput: string;

  constructor(message: string, rawOutput: string, issues: string[] = []) {
    super(message);
    this.name = 'ParseError';
    this.rawOutput = rawOutput;
    this.issues = issues;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ParseError);
    }
  }
}

/**
 * Rules, templates or provider settings are unusable
 */
export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}:\n${problems.join('\n')}` : message);
    this.name = 'ConfigurationError';
    this.problems = problems;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Attempted an operation the state machine does not allow
 */
export class InvalidStateError extends Error {
  public readonly phase: DebatePhase;

  constructor(message: string, phase: DebatePhase) {
    super(message);
    this.name = 'InvalidStateError';
    this.phase = phase;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidStateError);
    }
  }
}

/**
 * Build a call error for a code, picking the transient or permanent class
 */
export function createCallError(
  message: string,
  code: CallErrorCode,
  statusCode?: number,
  cause?: unknown
): CallError {
  if (TRANSIENT_CODES.has(code)) {
    return new TransientCallError(message, code, statusCode, cause);
  }
  return new PermanentCallError(message, code, { statusCode, cause });
}

/**
 * Map an HTTP status code to a call error
 */
export function callErrorFromStatus(status: number, message: string, cause?: unknown): CallError {
  if (status === 429) return createCallError(message, 'rate_limit', status, cause);
  if (status === 408) return createCallError(message, 'timeout', status, cause);
  if (status === 401 || status === 403) return createCallError(message, 'authentication', status, cause);
  if (status === 404) return createCallError(message, 'not_found', status, cause);
  if (status >= 500) return createCallError(message, 'server_error', status, cause);
  if (status >= 400) return createCallError(message, 'invalid_request', status, cause);
  return createCallError(message, 'unknown', status, cause);
}

/**
 * Classify an unknown failure from a transport into the call error taxonomy
 */
export function classifyCallError(error: unknown): CallError {
  if (error instanceof TransientCallError || error instanceof PermanentCallError) {
    return error;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('rate limit') || message.includes('429')) {
      return new TransientCallError(error.message, 'rate_limit', 429, error);
    }

    if (message.includes('timeout') || message.includes('timed out')) {
      return new TransientCallError(error.message, 'timeout', undefined, error);
    }

    if (
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket hang up') ||
      message.includes('fetch failed')
    ) {
      return new TransientCallError(error.message, 'network', undefined, error);
    }

    if (message.includes('authentication') || message.includes('unauthorized') || message.includes('401')) {
      return new PermanentCallError(error.message, 'authentication', { statusCode: 401, cause: error });
    }

    if (message.includes('not found') || message.includes('404')) {
      return new PermanentCallError(error.message, 'not_found', { statusCode: 404, cause: error });
    }

    if (message.includes('invalid') || message.includes('bad request') || message.includes('400')) {
      return new PermanentCallError(error.message, 'invalid_request', { statusCode: 400, cause: error });
    }

    if (message.includes('server error') || message.includes('500') || message.includes('503')) {
      return new TransientCallError(error.message, 'server_error', 500, error);
    }

    return new PermanentCallError(error.message, 'unknown', { cause: error });
  }

  return new PermanentCallError(String(error), 'unknown');
}
