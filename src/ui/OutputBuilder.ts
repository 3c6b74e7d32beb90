/**
 * Structured JSON output for CLI commands.
 */

import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error response for commands.
   *
   * @param error - Error message or instance
   * @param options - Extra fields (exitCode, suggestion, ...)
   * @returns JSON-serializable error object
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  /**
   * Build a JSON success response for commands.
   *
   * @param data - Response data
   * @returns JSON-serializable success object
   */
  static buildJsonSuccess(data: Record<string, unknown>): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      ...data,
    };
  }
}
