/**
 * Error utility functions for the CLI layer.
 */

import { ChannelConnectionError } from '@/transport/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Detect whether an error means the server is not reachable.
 *
 * @example
 * ```typescript
 * try {
 *   await sendRequest('ping');
 * } catch (error) {
 *   if (isServerUnreachableError(error)) {
 *     console.error('Is the instrument server running?');
 *   }
 * }
 * ```
 */
export function isServerUnreachableError(error: unknown): error is ChannelConnectionError {
  return (
    error instanceof ChannelConnectionError &&
    (error.code === 'ECONNREFUSED' || error.code === 'ENOTFOUND')
  );
}

/**
 * Exit code carried by a library or command error, if any.
 */
export function getExitCode(
  error: unknown,
  fallback: number = EXIT_CODES.UNHANDLED_EXCEPTION
): number {
  if (error instanceof Error && 'exitCode' in error && typeof error.exitCode === 'number') {
    return error.exitCode;
  }
  return fallback;
}
