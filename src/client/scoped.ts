/**
 * Scoped session use and the one-shot request helper.
 */

import { DEFAULT_HOST, DEFAULT_PORT } from '@/constants.js';

import { ClientSession } from './ClientSession.js';
import type { ClientSessionOptions } from './types.js';

/**
 * Run `fn` with a connected session and disconnect afterwards.
 *
 * Accepts an existing session (connected first if needed) or options for a
 * new one. `disconnect()` runs exactly once, whether `fn` resolves or throws.
 *
 * @example
 * ```typescript
 * const readings = await withClientSession({ port: 5555 }, async (session) => [
 *   await session.ask({ operation: 'get', target: 'dmm.voltage' }),
 *   await session.ask({ operation: 'get', target: 'dmm.current' }),
 * ]);
 * ```
 */
export async function withClientSession<T>(
  sessionOrOptions: ClientSession | ClientSessionOptions,
  fn: (session: ClientSession) => Promise<T>
): Promise<T> {
  const session =
    sessionOrOptions instanceof ClientSession
      ? sessionOrOptions
      : new ClientSession({ ...sessionOrOptions, connect: false });

  try {
    if (!session.isConnected()) {
      session.connect();
    }
    return await fn(session);
  } finally {
    session.disconnect();
  }
}

/**
 * Open a session, issue exactly one request, disconnect, and return the reply.
 *
 * @param message - JSON-serializable request
 * @param host - Server host (default: localhost)
 * @param port - Server port (default: 5555)
 * @param options - Remaining session options (timeout, raiseOnError, ...)
 */
export async function sendRequest(
  message: unknown,
  host: string = DEFAULT_HOST,
  port: number = DEFAULT_PORT,
  options: Omit<ClientSessionOptions, 'host' | 'port' | 'connect'> = {}
): Promise<unknown> {
  return withClientSession({ ...options, host, port }, (session) => session.ask(message));
}
