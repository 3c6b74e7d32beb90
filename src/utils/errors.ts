/**
 * Error handling utilities.
 */

/**
 * Extract a message from a thrown value of unknown type.
 *
 * @example
 * ```typescript
 * try {
 *   await session.ask({ operation: 'get', target: 'dmm.voltage' });
 * } catch (error) {
 *   console.error(`Request failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Read the errno-style `code` of a Node.js system error, if it carries one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
