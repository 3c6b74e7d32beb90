/**
 * Error handling for the instrument-client CLI.
 */

export { CommandError, type ErrorMetadata } from './CommandError.js';
export { getExitCode, isServerUnreachableError } from './utils.js';
export { getErrorMessage } from '@/utils/errors.js';
