/**
 * Structured transport error classes.
 *
 * Every failure of the request/reply channel surfaces as one of these, so the
 * session can tell a lost reply (timeout) apart from a broken connection.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for all transport-related errors.
 *
 * Carries an exit code for consistent CLI behavior.
 */
export class TransportError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'TransportError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }
}

/**
 * Thrown when a server address string or host/port pair is invalid.
 *
 * @example
 * ```typescript
 * throw new InvalidAddressError('udp://localhost:5555', 'unsupported scheme "udp"');
 * ```
 */
export class InvalidAddressError extends TransportError {
  public override readonly name = 'InvalidAddressError';
  public readonly address: string;

  constructor(address: string, reason: string) {
    super(`Invalid server address "${address}": ${reason}`, EXIT_CODES.INVALID_ARGUMENTS);
    this.address = address;
  }
}

/**
 * Thrown when the TCP connection to the server fails or errors.
 *
 * @example
 * ```typescript
 * throw new ChannelConnectionError('Connection refused', 'tcp://localhost:5555', 'ECONNREFUSED');
 * ```
 */
export class ChannelConnectionError extends TransportError {
  public override readonly name = 'ChannelConnectionError';
  public readonly address: string;
  public readonly code?: string;

  constructor(message: string, address: string, code?: string) {
    super(
      message,
      code === 'ECONNREFUSED' || code === 'ENOTFOUND'
        ? EXIT_CODES.RESOURCE_NOT_FOUND
        : EXIT_CODES.CONNECTION_FAILURE
    );
    this.address = address;
    if (code !== undefined) {
      this.code = code;
    }
  }
}

/**
 * Thrown when no reply arrives within the channel's receive timeout.
 *
 * The channel stays in the awaiting-reply state afterwards and refuses
 * further sends; it has to be replaced.
 *
 * @example
 * ```typescript
 * throw new ChannelTimeoutError('tcp://localhost:5555', 5000);
 * ```
 */
export class ChannelTimeoutError extends TransportError {
  public override readonly name = 'ChannelTimeoutError';
  public readonly address: string;
  public readonly timeoutMs: number;

  constructor(address: string, timeoutMs: number) {
    super(`No reply from ${address} within ${timeoutMs}ms`, EXIT_CODES.REQUEST_TIMEOUT);
    this.address = address;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Thrown when the connection closes before a reply was received.
 */
export class ChannelClosedError extends TransportError {
  public override readonly name = 'ChannelClosedError';
  public readonly address: string;

  constructor(address: string, detail = 'connection closed before reply received') {
    super(`${address}: ${detail}`, EXIT_CODES.CONNECTION_FAILURE);
    this.address = address;
  }
}

/**
 * Thrown when an operation breaks the send/receive alternation, or is issued
 * on a channel that is closed or not bound yet.
 */
export class ChannelStateError extends TransportError {
  public override readonly name = 'ChannelStateError';

  constructor(message: string) {
    super(message, EXIT_CODES.INVALID_STATE);
  }
}

/**
 * Thrown when a received frame is not valid JSON.
 */
export class FrameParseError extends TransportError {
  public override readonly name = 'FrameParseError';
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(`Failed to parse reply frame: ${message}`, EXIT_CODES.PROTOCOL_ERROR);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when an outgoing message cannot be serialized to a JSON frame.
 * Raised before anything is written, so the channel stays usable.
 */
export class FrameEncodeError extends TransportError {
  public override readonly name = 'FrameEncodeError';
  public override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(`Failed to encode request frame: ${message}`, EXIT_CODES.INVALID_ARGUMENTS);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}
