#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { CommandError } from '@/ui/errors/index.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { genericError } from '@/ui/messages/errors.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

// Commander Configuration
const CLI_NAME = 'instrument-client';
const CLI_DESCRIPTION = 'Request/reply client for instrument servers';

const log = createLogger('cli');

/**
 * Main entry point.
 *
 * 1. Enable debug logging early when --debug is present
 * 2. Register command handlers
 * 3. Parse arguments and route to the command
 */
async function main(): Promise<void> {
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

main().catch((error: unknown) => {
  // Option parsers throw CommandError while commander parses arguments
  if (error instanceof CommandError) {
    console.error(genericError(error.message));
    process.exit(error.exitCode);
  }
  log.info(`Unexpected failure: ${getErrorMessage(error)}`);
  process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
});
