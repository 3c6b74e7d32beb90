/**
 * Socket Connection Manager
 *
 * Opens TCP connections to the instrument server with event wiring and cleanup.
 */

import { connect } from 'net';

import type { Socket } from 'net';

import { createLogger } from '@/ui/logging/index.js';

import { formatAddress, type Address } from './address.js';

const log = createLogger('transport');

export interface SocketHandlers {
  onData?: (chunk: string) => void;
  onError?: (error: Error) => void;
  onClose?: () => void;
}

/**
 * Create a TCP socket to `address` and attach the given handlers.
 *
 * `cleanup` destroys the socket; it is safe to call more than once.
 */
export function createSocket(
  address: Address,
  handlers: SocketHandlers
): { socket: Socket; cleanup: () => void } {
  const socket: Socket = connect({ host: address.host, port: address.port });
  const label = formatAddress(address);

  socket.setEncoding('utf8');
  socket.setNoDelay(true);

  socket.once('connect', () => log.debug(`Connected to ${label}`));

  if (handlers.onData) {
    socket.on('data', handlers.onData);
  }

  // A destroyed socket can still emit late errors; keep a listener attached
  socket.on('error', (error: Error) => {
    log.debug(`Socket error on ${label}: ${error.message}`);
    handlers.onError?.(error);
  });

  if (handlers.onClose) {
    socket.once('close', handlers.onClose);
  }

  const cleanup = (): void => {
    if (!socket.destroyed) {
      socket.destroy();
    }
  };

  return { socket, cleanup };
}
