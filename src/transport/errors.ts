/**
 * Transport Error Formatting
 *
 * Builds structured transport errors with connection context.
 */

import { getErrorCode, getErrorMessage } from '@/utils/errors.js';

import { ChannelConnectionError, FrameEncodeError, FrameParseError } from './TransportError.js';

export function formatConnectionError(address: string, error: Error): ChannelConnectionError {
  const code = getErrorCode(error);
  const message = [
    'Server connection error',
    `Address: ${address}`,
    ...(code ? [`Code: ${code}`] : []),
    `Details: ${error.message}`,
  ].join(' | ');
  return new ChannelConnectionError(message, address, code);
}

export function formatParseError(error: unknown): FrameParseError {
  const cause = error instanceof Error ? error : undefined;
  return new FrameParseError(getErrorMessage(error), cause);
}

export function formatEncodeError(error: unknown): FrameEncodeError {
  const cause = error instanceof Error ? error : undefined;
  return new FrameEncodeError(getErrorMessage(error), cause);
}
