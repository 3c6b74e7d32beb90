import { Option } from 'commander';

import { DEFAULT_HOST, DEFAULT_PORT } from '@/constants.js';
import { CommandError } from '@/ui/errors/index.js';
import { invalidPortError, invalidTimeoutError } from '@/ui/messages/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const MIN_PORT = 1;
const MAX_PORT = 65535;

/**
 * Shared --json flag for machine-readable output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Server host.
 */
export const hostOption = new Option('--host <host>', 'Instrument server host').default(
  DEFAULT_HOST
);

/**
 * Parse a --port value.
 *
 * @throws CommandError when the value is not an integer port
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
    throw new CommandError(invalidPortError(value), {}, EXIT_CODES.INVALID_ARGUMENTS);
  }
  return port;
}

/**
 * Parse a --timeout value in milliseconds.
 *
 * @throws CommandError when the value is not a positive number
 */
export function parseTimeout(value: string): number {
  const timeoutMs = Number(value);
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new CommandError(invalidTimeoutError(value), {}, EXIT_CODES.INVALID_ARGUMENTS);
  }
  return Math.ceil(timeoutMs);
}

/**
 * Server port, validated.
 */
export const portOption = new Option('--port <port>', 'Instrument server port')
  .default(DEFAULT_PORT)
  .argParser(parsePort);

/**
 * Reply timeout in milliseconds. Without it the session default applies
 * (INSTRUMENT_CLIENT_TIMEOUT_MS or 5000).
 */
export const timeoutOption = new Option(
  '--timeout <ms>',
  'Reply timeout in milliseconds'
).argParser(parseTimeout);
