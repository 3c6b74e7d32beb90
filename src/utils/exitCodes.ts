/**
 * Semantic exit codes for the instrument-client CLI.
 *
 * Exit codes follow semantic ranges so scripts can branch on them:
 * - **0**: Success
 * - **1**: Generic failure
 * - **80-99**: User errors (invalid input, missing files, unreachable server)
 * - **100-119**: Software errors (timeouts, server-reported failures, bugs)
 *
 * Values are stable; new codes are only added inside the existing ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Requested resource not found (config file, server not listening) */
  RESOURCE_NOT_FOUND: 83,

  /** Session is in the wrong state for the operation */
  INVALID_STATE: 87,

  // Software Errors (100-119)

  /** Server connection failed or dropped */
  CONNECTION_FAILURE: 101,

  /** Server did not reply before the receive timeout */
  REQUEST_TIMEOUT: 102,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Server replied with a malformed or unrecognized frame */
  PROTOCOL_ERROR: 105,

  /** Server reported an exception while handling the request */
  SERVER_ERROR: 106,

  /** Instrument configuration could not be split */
  CONFIG_ERROR: 107,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;
