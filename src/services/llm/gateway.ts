/**
 * Reasoning Call Gateway
 *
 * Uniform entry point for every model call made by the role agents.
 * Owns retry with exponential backoff, per-attempt timeouts and the
 * extraction of JSON objects from structured responses.
 */

import { createLogger, loggers } from '../logging/index.js';
import {
  ParseError,
  PermanentCallError,
  TransientCallError,
  classifyCallError,
} from '../../types/errors.js';
import type {
  ChatMessage,
  LLMRequest,
  LLMResponse,
  LLMTransport,
  ReasoningCallRequest,
  ReasoningCallResult,
  ReasoningGateway,
  RetryConfig,
} from '../../types/llm.js';

const logger = createLogger({ module: 'llm-gateway' });

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = Object.freeze({
  maxAttempts: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  jitterRatio: 0.3,
});

export const DEFAULT_TIMEOUT_MS = 120000;

/**
 * Gateway construction options
 */
export interface LLMGatewayOptions {
  /** Network transport for the provider */
  transport: LLMTransport;
  /** Model identifier sent with every request */
  model: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  /** Per-attempt timeout in milliseconds */
  timeoutMs?: number;
  retry?: Partial<RetryConfig>;
  /** Replaceable for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Source of jitter, defaults to Math.random */
  random?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull a JSON object out of raw model output
 * Accepts bare JSON, fenced code blocks, and objects surrounded by prose
 */
export function extractJsonObject(raw: string): Record<string, unknown> {
  const trimmed = raw.trim();
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const body = fenced?.[1]?.trim() ?? trimmed;

  const direct = tryParse(body);
  if (isRecord(direct)) {
    return direct;
  }

  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const embedded = tryParse(body.slice(start, end + 1));
    if (isRecord(embedded)) {
      return embedded;
    }
  }

  throw new ParseError('Structured response did not contain a JSON object', raw, [
    'expected a JSON object',
  ]);
}

/**
 * Gateway bound to a single model
 */
export class LLMGateway implements ReasoningGateway {
  private readonly transport: LLMTransport;
  private readonly model: string;
  private readonly temperature?: number;
  private readonly maxTokens?: number;
  private readonly topP?: number;
  private readonly timeoutMs: number;
  private readonly retryConfig: RetryConfig;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: LLMGatewayOptions) {
    this.transport = options.transport;
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.topP = options.topP;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.retry };
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Invoke the model and shape the response for the requested mode
   */
  async invoke(request: ReasoningCallRequest): Promise<ReasoningCallResult> {
    const llmRequest = this.buildRequest(request);
    const startTime = Date.now();

    logger.debug({
      role: request.role,
      model: this.model,
      responseMode: request.responseMode,
      promptLength: request.prompt.length,
    }, 'Starting reasoning call');

    const response = await this.executeWithRetry(llmRequest, request.role);

    logger.debug({
      role: request.role,
      model: response.model,
      usage: response.usage,
      duration: Date.now() - startTime,
      finishReason: response.finishReason,
    }, 'Reasoning call successful');

    if (request.responseMode === 'text') {
      return { mode: 'text', text: response.content, usage: response.usage };
    }

    // Malformed output is permanent for this call
    return {
      mode: 'structured',
      data: extractJsonObject(response.content),
      raw: response.content,
      usage: response.usage,
    };
  }

  private buildRequest(request: ReasoningCallRequest): LLMRequest {
    const messages: ChatMessage[] = [];
    if (request.systemPrompt) {
      messages.push({ role: 'system', content: request.systemPrompt });
    }
    messages.push({ role: 'user', content: request.prompt });

    return {
      model: this.model,
      messages,
      temperature: request.temperature ?? this.temperature,
      maxTokens: request.maxTokens ?? this.maxTokens,
      topP: this.topP,
      responseFormat: request.responseMode === 'structured' ? 'json' : 'text',
    };
  }

  /**
   * Execute request with exponential backoff retry logic
   */
  private async executeWithRetry(request: LLMRequest, role: string): Promise<LLMResponse> {
    const { maxAttempts } = this.retryConfig;
    let lastError: TransientCallError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.executeAttempt(request);
      } catch (error) {
        const callError = classifyCallError(error);
        if (callError instanceof PermanentCallError) {
          throw callError;
        }

        lastError = callError;
        if (attempt === maxAttempts) {
          break;
        }

        const delay = this.calculateBackoff(attempt - 1);
        loggers.callRetry({
          role,
          model: this.model,
          attempt,
          maxAttempts,
          delay_ms: delay,
          code: callError.code,
        });
        await this.sleep(delay);
      }
    }

    throw new PermanentCallError(
      `Call failed after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      'retries_exhausted',
      { statusCode: lastError?.statusCode, attempts: maxAttempts, cause: lastError }
    );
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  calculateBackoff(retryIndex: number): number {
    const exponentialDelay = this.retryConfig.baseDelay * Math.pow(2, retryIndex);
    const jitter = this.random() * this.retryConfig.jitterRatio * exponentialDelay;
    return Math.min(exponentialDelay + jitter, this.retryConfig.maxDelay);
  }

  /**
   * Single attempt, aborted when the timeout fires first
   */
  private async executeAttempt(request: LLMRequest): Promise<LLMResponse> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      // Reject before aborting so the race settles with the timeout
      timer = setTimeout(() => {
        reject(new TransientCallError(`Request timeout after ${this.timeoutMs}ms`, 'timeout'));
        controller.abort();
      }, this.timeoutMs);
    });

    const requestPromise = this.transport.complete(request, controller.signal);
    // The losing side of the race still settles after an abort
    void requestPromise.catch((error: unknown) => {
      if (controller.signal.aborted) {
        logger.debug({ err: error }, 'Aborted request settled after timeout');
      }
    });

    try {
      return await Promise.race([requestPromise, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }
}
