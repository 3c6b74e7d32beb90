/**
 * Centralized configuration constants for the instrument client.
 *
 * Timing and connection defaults live here so the session, the one-shot helper
 * and the CLI agree on them.
 */

// ============================================================================
// SERVER CONNECTION
// ============================================================================

/**
 * Default instrument server host
 */
export const DEFAULT_HOST = 'localhost';

/**
 * Default instrument server port
 */
export const DEFAULT_PORT = 5555;

/**
 * Transport scheme used in server addresses (`tcp://host:port`)
 */
export const ADDRESS_SCHEME = 'tcp';

// ============================================================================
// TIMEOUTS
// ============================================================================

/**
 * Default time to wait for a server reply before declaring a timeout (5 seconds)
 */
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

/**
 * Environment variable that overrides the default reply timeout, in milliseconds
 */
export const REQUEST_TIMEOUT_ENV_VAR = 'INSTRUMENT_CLIENT_TIMEOUT_MS';

/**
 * Resolve the reply timeout, honouring INSTRUMENT_CLIENT_TIMEOUT_MS.
 * Non-numeric or non-positive values fall back to the default; fractions
 * round up to whole milliseconds.
 */
export function getRequestTimeout(): number {
  const raw = process.env[REQUEST_TIMEOUT_ENV_VAR];
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_REQUEST_TIMEOUT_MS;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return DEFAULT_REQUEST_TIMEOUT_MS;
  }
  return Math.ceil(parsed);
}

// ============================================================================
// SESSION LIMITS
// ============================================================================

/**
 * Maximum number of diagnostics a session keeps (oldest are dropped first)
 */
export const MAX_SESSION_DIAGNOSTICS = 100;

/**
 * Warning type passed to process.emitWarning for server-reported warnings
 */
export const SERVER_WARNING_TYPE = 'ServerWarning';
