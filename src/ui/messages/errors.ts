/**
 * Common error messages.
 *
 * Reusable CLI error text with consistent formatting.
 */

import { joinLines } from '@/ui/formatting.js';

/**
 * Generic "Error: ..." line.
 */
export function genericError(message: string): string {
  return `Error: ${message}`;
}

export function unknownError(): string {
  return 'Error: Unknown error';
}

/**
 * Message shown when nothing listens on the server address.
 *
 * @example
 * ```typescript
 * console.error(serverNotReachableError('tcp://localhost:5555'));
 * ```
 */
export function serverNotReachableError(address: string): string {
  return joinLines(
    `Error: No instrument server reachable at ${address}`,
    '',
    'Suggestions:',
    '  Check that the server is running',
    '  Pass --host and --port to target another server'
  );
}

/**
 * Message shown when the server does not reply in time.
 */
export function serverTimeoutError(address: string, timeoutMs: number): string {
  return joinLines(
    `Error: ${address} did not reply within ${timeoutMs}ms`,
    '',
    'Suggestions:',
    '  Increase the timeout with --timeout <ms>',
    '  Check the server log for a long-running request'
  );
}

export function invalidPortError(value: string): string {
  return `Invalid port "${value}": expected an integer between 1 and 65535`;
}

export function invalidTimeoutError(value: string): string {
  return `Invalid timeout "${value}": expected a positive number of milliseconds`;
}
