/**
 * Configuration errors.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Base class for instrument configuration errors.
 */
export class ConfigError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number = EXIT_CODES.CONFIG_ERROR) {
    super(message);
    this.name = 'ConfigError';
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

/**
 * Thrown when a recognized field is present but explicitly null.
 *
 * @example
 * ```typescript
 * throw new NullFieldError('dmm', 'initialize');
 * // "initialize" field of instrument "dmm" cannot be null
 * ```
 */
export class NullFieldError extends ConfigError {
  public override readonly name = 'NullFieldError';
  public readonly instrument: string;
  public readonly field: string;

  constructor(instrument: string, field: string) {
    super(`"${field}" field of instrument "${instrument}" cannot be null`);
    this.instrument = instrument;
    this.field = field;
  }
}

/**
 * Thrown when the document does not have the expected structure.
 */
export class ConfigFormatError extends ConfigError {
  public override readonly name = 'ConfigFormatError';
  public readonly source?: string;
  public override readonly cause?: Error;

  constructor(message: string, source?: string, cause?: Error) {
    super(source ? `${source}: ${message}` : message);
    if (source !== undefined) {
      this.source = source;
    }
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * Thrown when the configuration file does not exist.
 */
export class ConfigNotFoundError extends ConfigError {
  public override readonly name = 'ConfigNotFoundError';
  public readonly path: string;

  constructor(path: string) {
    super(`Configuration file not found: ${path}`, EXIT_CODES.RESOURCE_NOT_FOUND);
    this.path = path;
  }
}
