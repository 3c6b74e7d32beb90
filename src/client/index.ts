/**
 * Client Module
 *
 * Public API for talking to an instrument server:
 * - ClientSession (persistent session, one request at a time)
 * - withClientSession / sendRequest (scoped and one-shot use)
 * - classified session errors
 */

export { ClientSession } from './ClientSession.js';
export { sendRequest, withClientSession } from './scoped.js';
export {
  ClientError,
  RequestTimeoutError,
  ServerError,
  SessionStateError,
  UnrecognizedErrorShapeError,
} from './errors.js';
export type {
  ClientSessionOptions,
  DiagnosticKind,
  SessionDiagnostic,
  WarningHandler,
} from './types.js';
