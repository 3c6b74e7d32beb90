import { OutputBuilder } from '@/ui/OutputBuilder.js';
import {
  CommandError,
  getErrorMessage,
  getExitCode,
  isServerUnreachableError,
} from '@/ui/errors/index.js';
import { genericError, unknownError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Standard options supported by CommandRunner.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  /** Data to output (for successful commands) */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Exit code override */
  exitCode?: number;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Hook that turns a thrown error into a friendlier human-readable message.
 * Returning undefined keeps the default "Error: <message>" line.
 */
export type ErrorDescriber = (error: unknown) => string | undefined;

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Run a command with consistent error handling, output formatting and exit codes.
 *
 * - JSON or human-readable output depending on --json
 * - CommandError metadata printed as help text
 * - exit codes taken from library errors (timeouts, server errors, config errors)
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => ({ success: true, data: await sendRequest(opts.message) }),
 *   options,
 *   formatValue
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>,
  describeError?: ErrorDescriber
): Promise<void> {
  try {
    const result = await handler(options);

    if (!result.success) {
      if (options.json) {
        printJson(OutputBuilder.buildJsonError(result.error ?? 'Unknown error'));
      } else {
        console.error(result.error ? genericError(result.error) : unknownError());
      }
      process.exit(result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION);
    }

    if (options.json) {
      printJson(OutputBuilder.buildJsonSuccess({ data: result.data ?? null }));
    } else if (formatter && result.data !== undefined) {
      console.log(formatter(result.data));
    } else {
      printJson(result.data ?? null);
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    if (error instanceof CommandError) {
      if (options.json) {
        printJson(OutputBuilder.buildJsonError(error.message, { ...error.metadata }));
      } else {
        console.error(genericError(error.message));
        for (const value of Object.values(error.metadata)) {
          console.error(value);
        }
      }
      process.exit(error.exitCode);
    }

    const exitCode = isServerUnreachableError(error)
      ? EXIT_CODES.RESOURCE_NOT_FOUND
      : getExitCode(error);

    if (options.json) {
      printJson(OutputBuilder.buildJsonError(getErrorMessage(error), { exitCode }));
    } else {
      console.error(describeError?.(error) ?? genericError(getErrorMessage(error)));
    }
    process.exit(exitCode);
  }
}
