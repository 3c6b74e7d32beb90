import type { ChannelFactory } from '@/transport/index.js';

/**
 * Handler for server-reported warnings. Warnings never abort a request.
 */
export type WarningHandler = (message: string) => void;

/**
 * Options for {@link ClientSession}.
 */
export interface ClientSessionOptions {
  /** Server host (default: localhost) */
  host?: string;
  /** Server port (default: 5555) */
  port?: number;
  /** Reply timeout in milliseconds (default: INSTRUMENT_CLIENT_TIMEOUT_MS or 5000) */
  timeoutMs?: number;
  /** Throw on timeouts, server exceptions and unknown error shapes (default: true) */
  raiseOnError?: boolean;
  /** Connect while constructing (default: true) */
  connect?: boolean;
  /** Builds the transport channel (default: JSONL over TCP) */
  channelFactory?: ChannelFactory;
  /** Receives server warnings (default: process.emitWarning) */
  onWarning?: WarningHandler;
}

/**
 * Kind of a recorded non-fatal condition.
 */
export type DiagnosticKind = 'text' | 'exception' | 'unrecognized' | 'timeout';

/**
 * Non-fatal condition recorded by a session instead of being thrown.
 */
export interface SessionDiagnostic {
  kind: DiagnosticKind;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
}
