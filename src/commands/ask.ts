import type { Command } from 'commander';

import { ClientSession, RequestTimeoutError, withClientSession } from '@/client/index.js';
import {
  hostOption,
  jsonOption,
  portOption,
  timeoutOption,
} from '@/commands/shared/commonOptions.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { isServerUnreachableError } from '@/ui/errors/index.js';
import { formatAskResult, type AskResultData } from '@/ui/formatters/index.js';
import { serverNotReachableError, serverTimeoutError } from '@/ui/messages/errors.js';

/**
 * Options for `instrument-client ask`.
 */
interface AskOptions extends BaseCommandOptions {
  host: string;
  port: number;
  timeout?: number;
  /** false when --no-raise is given */
  raise: boolean;
}

/**
 * Interpret the CLI argument as JSON, falling back to the raw string.
 *
 * @example
 * ```typescript
 * parseMessageArgument('{"operation":"get"}'); // { operation: 'get' }
 * parseMessageArgument('ping');                // 'ping'
 * ```
 */
export function parseMessageArgument(raw: string): unknown {
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch {
    return raw;
  }
}

/**
 * Register the ask command.
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Send one request to the instrument server and print the reply')
    .argument('<message>', 'Request as JSON (plain text is sent as a string)')
    .addOption(hostOption)
    .addOption(portOption)
    .addOption(timeoutOption)
    .option('--no-raise', 'Record timeouts and server exceptions instead of failing')
    .addOption(jsonOption)
    .action(async (message: string, options: AskOptions) => {
      await runCommand<AskOptions, AskResultData>(
        async (opts) => {
          const session = new ClientSession({
            host: opts.host,
            port: opts.port,
            raiseOnError: opts.raise,
            connect: false,
            ...(opts.timeout !== undefined && { timeoutMs: opts.timeout }),
          });

          const reply = await withClientSession(session, (s) =>
            s.ask(parseMessageArgument(message))
          );
          return {
            success: true,
            data: {
              address: session.getAddress(),
              reply,
              diagnostics: [...session.getDiagnostics()],
            },
          };
        },
        options,
        formatAskResult,
        (error) => {
          if (isServerUnreachableError(error)) {
            return serverNotReachableError(error.address);
          }
          if (error instanceof RequestTimeoutError) {
            return serverTimeoutError(error.address, error.timeoutMs);
          }
          return undefined;
        }
      );
    });
}
