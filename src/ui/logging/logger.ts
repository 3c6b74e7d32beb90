/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * Only 'info' lines are shown by default. Set INSTRUMENT_CLIENT_DEBUG=1 or pass
 * --debug to also see 'debug' lines (frames, channel state, timings).
 */

// ============================================================================
// Global Debug State
// ============================================================================

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called by the CLI entry point when the --debug flag is present.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Check if debug logging is currently enabled.
 *
 * @returns True if debug mode is active
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env['INSTRUMENT_CLIENT_DEBUG'] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility of log messages.
 *
 * - 'info': Always shown (server diagnostics, channel replacement, failures)
 * - 'debug': Only shown in debug mode (frames, connection tracing)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext = 'cli' | 'client' | 'transport' | 'config';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /**
   * Log an info message (always shown).
   */
  info: (message: string) => void;

  /**
   * Log a debug message (only shown in debug mode).
   */
  debug: (message: string) => void;

  /**
   * Shorthand for debug.
   */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

function write(context: LogContext, message: string, level: LogLevel): void {
  if (level === 'debug' && !isDebugEnabled()) {
    return;
  }
  console.error(`[${context}] ${message}`);
}

/**
 * Create a logger instance for a specific context.
 *
 * @param context - Component context for log prefix
 * @returns Logger instance with info/debug methods
 *
 * @example
 * ```typescript
 * const log = createLogger('client');
 *
 * // Always shown
 * log.info('Server did not reply before timeout');
 *
 * // Only shown with --debug or INSTRUMENT_CLIENT_DEBUG=1
 * log.debug('Connecting to tcp://localhost:5555');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  return Object.assign((message: string) => write(context, message, 'debug'), {
    info: (message: string) => write(context, message, 'info'),
    debug: (message: string) => write(context, message, 'debug'),
  });
}
