/**
 * Server addresses.
 *
 * The channel connects to `tcp://host:port`; sessions are configured with a
 * host and port and render them through here.
 */

import { ADDRESS_SCHEME } from '@/constants.js';

import { InvalidAddressError } from './TransportError.js';

/**
 * Host and port of an instrument server.
 */
export interface Address {
  host: string;
  port: number;
}

const MIN_PORT = 1;
const MAX_PORT = 65535;

function validatePort(port: number, raw: string): void {
  if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
    throw new InvalidAddressError(raw, `port must be an integer in ${MIN_PORT}-${MAX_PORT}`);
  }
}

/**
 * Build a validated address from host and port.
 *
 * @throws InvalidAddressError on an empty host or out-of-range port
 */
export function createAddress(host: string, port: number): Address {
  const raw = `${host}:${port}`;
  if (host.trim() === '') {
    throw new InvalidAddressError(raw, 'host must not be empty');
  }
  validatePort(port, raw);
  return { host, port };
}

/**
 * Render an address as a connection string.
 *
 * @example
 * ```typescript
 * formatAddress({ host: 'localhost', port: 5555 }); // 'tcp://localhost:5555'
 * formatAddress({ host: '::1', port: 5555 });       // 'tcp://[::1]:5555'
 * ```
 */
export function formatAddress(address: Address): string {
  const host = address.host.includes(':') ? `[${address.host}]` : address.host;
  return `${ADDRESS_SCHEME}://${host}:${address.port}`;
}

const ADDRESS_PATTERN = /^([a-z][a-z0-9+.-]*):\/\/(\[[^\]]+\]|[^:/[\]]+):(\d+)$/i;

/**
 * Parse a `tcp://host:port` connection string.
 *
 * @throws InvalidAddressError if the string is malformed or uses another scheme
 */
export function parseAddress(value: string): Address {
  const match = ADDRESS_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidAddressError(value, `expected ${ADDRESS_SCHEME}://<host>:<port>`);
  }

  const [, scheme = '', rawHost = '', rawPort = ''] = match;
  if (scheme.toLowerCase() !== ADDRESS_SCHEME) {
    throw new InvalidAddressError(value, `unsupported scheme "${scheme}"`);
  }

  const host = rawHost.startsWith('[') ? rawHost.slice(1, -1) : rawHost;
  const port = Number(rawPort);
  validatePort(port, value);

  return { host, port };
}
