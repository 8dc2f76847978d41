/**
 * Logging service using Pino
 * Provides structured logging with debate and agent context
 */

import pino from 'pino';
import type { Role } from '../../types/debate.js';

/**
 * Development transport configuration with pretty printing
 */
const developmentTransport = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '{levelLabel} - {msg}',
  },
};

/**
 * Default logger configuration (JSON format for log aggregation)
 */
const jsonConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      hostname: bindings.hostname,
      node_version: process.version,
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    env: process.env.NODE_ENV,
  },
};

/**
 * Development logger configuration (human-readable format)
 */
const developmentConfig: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || 'debug',
  transport: developmentTransport,
};

/**
 * Main logger instance
 */
export const logger = pino(
  process.env.NODE_ENV === 'development' ? developmentConfig : jsonConfig
);

/**
 * Create a child logger with debate context
 * @param debateId - Unique identifier for the debate
 */
export function createDebateLogger(debateId: string) {
  return logger.child({ debateId, context: 'debate' });
}

/**
 * Create a child logger with agent context
 * @param role - Role the agent plays
 */
export function createAgentLogger(role: Role) {
  return logger.child({ agentType: role, context: 'agent' });
}

/**
 * Create a child logger with custom context
 */
export function createLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
