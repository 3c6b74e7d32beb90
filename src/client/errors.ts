/**
 * Client session errors.
 *
 * The classified outcomes of `ClientSession.ask` that abort a call.
 */

import type { ServerException } from '@/protocol/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for errors raised by a client session.
 */
export class ClientError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.SOFTWARE_ERROR) {
    super(message);
    this.name = 'ClientError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ClientError);
    }
  }
}

/**
 * Thrown when a request is issued on a session that is not connected.
 *
 * @example
 * ```typescript
 * throw new SessionStateError('tcp://localhost:5555');
 * ```
 */
export class SessionStateError extends ClientError {
  public override readonly name = 'SessionStateError';
  public readonly address: string;

  constructor(address: string, message = 'Not connected') {
    super(`${message} (${address})`, EXIT_CODES.INVALID_STATE);
    this.address = address;
  }
}

/**
 * Thrown when the server does not reply before the session timeout.
 * By the time this is raised the session already runs on a fresh channel.
 */
export class RequestTimeoutError extends ClientError {
  public override readonly name = 'RequestTimeoutError';
  public readonly address: string;
  public readonly timeoutMs: number;
  public override readonly cause?: Error;

  constructor(address: string, timeoutMs: number, cause?: Error) {
    super(
      `Server at ${address} did not reply before timeout (${timeoutMs}ms)`,
      EXIT_CODES.REQUEST_TIMEOUT
    );
    this.address = address;
    this.timeoutMs = timeoutMs;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when the server reports an exception for the request.
 *
 * @example
 * ```typescript
 * throw new ServerError({ kind: 'KeyError', detail: "'dmm' not in station" });
 * ```
 */
export class ServerError extends ClientError {
  public override readonly name = 'ServerError';
  public readonly kind: string;
  public readonly detail: string;

  constructor(exception: ServerException) {
    super(
      exception.detail
        ? `Server raised ${exception.kind}: ${exception.detail}`
        : `Server raised ${exception.kind}`,
      EXIT_CODES.SERVER_ERROR
    );
    this.kind = exception.kind;
    this.detail = exception.detail;
  }
}

/**
 * Thrown when the reply carries an error payload of an unknown shape.
 */
export class UnrecognizedErrorShapeError extends ClientError {
  public override readonly name = 'UnrecognizedErrorShapeError';
  public readonly raw: unknown;

  constructor(raw: unknown, description: string) {
    super(`Unknown error type: ${description}`, EXIT_CODES.PROTOCOL_ERROR);
    this.raw = raw;
  }
}
