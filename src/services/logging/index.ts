/**
 * Logging service exports
 */

// Core logger
export {
  logger,
  createDebateLogger,
  createAgentLogger,
  createLogger,
} from './logger.js';

// Structured logging helpers
export {
  loggers,
  startTimer,
} from './log-helpers.js';
