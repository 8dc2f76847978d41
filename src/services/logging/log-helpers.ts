/**
 * Structured logging helpers for common event types
 * Provides consistent logging patterns across the engine
 */

import { logger } from './logger.js';

/**
 * Category-based logging helpers
 * Each helper logs a specific type of event with consistent structure
 */
export const loggers = {
  /**
   * Log phase controller transitions
   * @param duration - Optional time spent in the phase, in milliseconds
   */
  stateTransition(debateId: string, from: string, to: string, duration?: number) {
    logger.info({
      category: 'state_machine',
      debateId,
      from,
      to,
      duration_ms: duration,
      event: 'transition',
    }, `State transition: ${from} -> ${to}`);
  },

  /**
   * Log agent calls with performance metrics
   */
  agentCall(params: {
    debateId: string;
    agent: string;
    phase: string;
    latency_ms: number;
    tokens?: number;
    success: boolean;
    error?: string;
  }) {
    const level = params.success ? 'info' : 'error';
    logger[level]({
      category: 'agent_call',
      event: 'llm_request',
      ...params,
    }, `Agent ${params.agent} ${params.success ? 'completed' : 'failed'} in ${params.latency_ms}ms`);
  },

  /**
   * Log a score produced by the scoring engine
   */
  scoreRecorded(params: {
    debateId: string;
    role: string;
    roundType: string;
    roundIndex: number;
    total: number;
  }) {
    logger.debug({
      category: 'scoring',
      event: 'score_recorded',
      ...params,
    }, `Scored ${params.role} ${params.roundType}#${params.roundIndex}: ${params.total}`);
  },

  /**
   * Log a retried gateway call
   * @param attempt - Attempt number that failed (1-based)
   * @param delay_ms - Wait before the next attempt
   */
  callRetry(params: {
    role: string;
    model: string;
    attempt: number;
    maxAttempts: number;
    delay_ms: number;
    code: string;
  }) {
    logger.warn({
      category: 'agent_call',
      event: 'llm_retry',
      ...params,
    }, `Retrying ${params.role} call (attempt ${params.attempt}/${params.maxAttempts}) in ${params.delay_ms}ms`);
  },

  /**
   * Log errors with full context and stack traces
   * @param context - Additional context (debateId, phase, etc.)
   */
  error(message: string, error: Error, context?: Record<string, unknown>) {
    logger.error({
      category: 'error',
      event: 'error_occurred',
      error: {
        message: error.message,
        stack: error.stack,
        name: error.name,
      },
      ...context,
    }, message);
  },

  /**
   * Log debate lifecycle events
   */
  debateLifecycle(
    debateId: string,
    event: 'started' | 'cancelled' | 'completed' | 'failed',
    metadata?: Record<string, unknown>
  ) {
    logger.info({
      category: 'debate_lifecycle',
      event: `debate_${event}`,
      debateId,
      ...metadata,
    }, `Debate ${event}`);
  },
};

/**
 * Performance timing helper
 * Returns a function that logs the duration when called
 *
 * @example
 * const endTimer = startTimer();
 * await someOperation();
 * endTimer('operation_name', { debateId: '123' });
 */
export function startTimer() {
  const start = Date.now();
  return (operation: string, context?: Record<string, unknown>) => {
    const duration = Date.now() - start;
    logger.debug({
      category: 'performance',
      event: 'operation_timed',
      operation,
      duration_ms: duration,
      ...context,
    }, `${operation} completed in ${duration}ms`);
    return duration;
  };
}
