/**
 * Logging utilities for the instrument client.
 *
 * Context-prefixed log lines on stderr, with a debug mode for verbose tracing.
 */

export {
  createLogger,
  enableDebugLogging,
  isDebugEnabled,
  type LogContext,
  type LogLevel,
  type Logger,
} from './logger.js';
