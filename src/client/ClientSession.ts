/**
 * Client session for an instrument server.
 *
 * Owns one request/reply channel and issues one request at a time. Replies are
 * classified into a returned message, a recorded diagnostic, a warning or a
 * thrown error. A timeout replaces the channel: the old one still waits for a
 * reply that may arrive late, and reusing it would pair every later request
 * with the wrong reply.
 */

import {
  DEFAULT_HOST,
  DEFAULT_PORT,
  MAX_SESSION_DIAGNOSTICS,
  SERVER_WARNING_TYPE,
  getRequestTimeout,
} from '@/constants.js';
import {
  decodeResponseEnvelope,
  describeEnvelopeError,
  type ResponseEnvelope,
} from '@/protocol/index.js';
import {
  ChannelTimeoutError,
  FrameEncodeError,
  TransportError,
  createAddress,
  createTransportChannel,
  formatAddress,
  type Address,
  type Channel,
  type ChannelFactory,
} from '@/transport/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { SerialLock } from '@/utils/concurrency.js';

import {
  RequestTimeoutError,
  ServerError,
  SessionStateError,
  UnrecognizedErrorShapeError,
} from './errors.js';
import type {
  ClientSessionOptions,
  DiagnosticKind,
  SessionDiagnostic,
  WarningHandler,
} from './types.js';

const log = createLogger('client');

const TIMEOUT_DIAGNOSTIC = 'Server did not reply before timeout.';

const emitServerWarning: WarningHandler = (message) => {
  process.emitWarning(message, SERVER_WARNING_TYPE);
};

/**
 * Request/reply session against one server address.
 *
 * Not reentrant per request: concurrent `ask` calls are queued and run one
 * after another.
 *
 * @example
 * ```typescript
 * const session = new ClientSession({ host: 'localhost', port: 5555, timeoutMs: 2000 });
 * try {
 *   const value = await session.ask({ operation: 'get', target: 'dmm.voltage' });
 * } finally {
 *   session.disconnect();
 * }
 * ```
 */
export class ClientSession {
  private connected = false;
  private channel: Channel | null = null;
  private readonly address: Address;
  private readonly addressString: string;
  private readonly timeoutMs: number;
  private readonly raiseOnError: boolean;
  private readonly channelFactory: ChannelFactory;
  private readonly onWarning: WarningHandler;
  private readonly lock = new SerialLock();
  private readonly diagnostics: SessionDiagnostic[] = [];

  constructor(options: ClientSessionOptions = {}) {
    this.address = createAddress(options.host ?? DEFAULT_HOST, options.port ?? DEFAULT_PORT);
    this.addressString = formatAddress(this.address);
    this.timeoutMs = options.timeoutMs ?? getRequestTimeout();
    this.raiseOnError = options.raiseOnError ?? true;
    this.channelFactory = options.channelFactory ?? createTransportChannel;
    this.onWarning = options.onWarning ?? emitServerWarning;

    if (!Number.isFinite(this.timeoutMs) || this.timeoutMs <= 0) {
      throw new RangeError(`timeoutMs must be a positive number, got ${this.timeoutMs}`);
    }

    if (options.connect ?? true) {
      this.connect();
    }
  }

  /**
   * Open a channel to the server address. No-op while already connected.
   */
  connect(): void {
    if (this.connected) {
      log.debug(`Already connected to ${this.addressString}`);
      return;
    }
    this.channel = this.openChannel();
    this.connected = true;
  }

  /**
   * Close the channel. No-op while disconnected.
   */
  disconnect(): void {
    const channel = this.channel;
    this.channel = null;
    this.connected = false;
    if (channel) {
      channel.close();
      log.debug(`Disconnected from ${this.addressString}`);
    }
  }

  /**
   * Send one request and wait for its reply.
   *
   * @param message - JSON-serializable request
   * @returns The reply's message; undefined after a timeout when raiseOnError is off
   * @throws SessionStateError when not connected
   * @throws RequestTimeoutError on timeout (raiseOnError only)
   * @throws ServerError when the server reports an exception (raiseOnError only)
   * @throws UnrecognizedErrorShapeError on an unknown error payload (raiseOnError only)
   * @throws TransportError when the connection fails or the reply is malformed
   */
  async ask(message: unknown): Promise<unknown> {
    this.requireChannel();
    if (this.lock.isBusy()) {
      log.debug(`Request queued behind ${this.lock.getQueueSize() + 1} other(s)`);
    }
    return this.lock.run(() => this.exchange(message));
  }

  isConnected(): boolean {
    return this.connected;
  }

  getAddress(): string {
    return this.addressString;
  }

  getTimeoutMs(): number {
    return this.timeoutMs;
  }

  /**
   * Non-fatal conditions recorded so far, oldest first.
   */
  getDiagnostics(): readonly SessionDiagnostic[] {
    return [...this.diagnostics];
  }

  clearDiagnostics(): void {
    this.diagnostics.length = 0;
  }

  private openChannel(): Channel {
    log.debug(`Connecting to ${this.addressString}`);
    const channel = this.channelFactory();
    channel.setReceiveTimeout(this.timeoutMs);
    channel.bind(this.address);
    return channel;
  }

  private requireChannel(): Channel {
    if (!this.connected || !this.channel) {
      throw new SessionStateError(this.addressString);
    }
    return this.channel;
  }

  private async exchange(message: unknown): Promise<unknown> {
    // A queued request may run after disconnect()
    let channel = this.requireChannel();
    if (!channel.isReady()) {
      // The connection dropped while idle; nothing was sent on it yet
      this.replaceChannel(channel);
      channel = this.requireChannel();
    }

    let reply: unknown;
    try {
      channel.send(message);
      reply = await channel.receive();
    } catch (error) {
      return this.handleTransportFailure(channel, error);
    }

    log.debug('Response received.');
    return this.classify(decodeResponseEnvelope(reply));
  }

  private handleTransportFailure(channel: Channel, error: unknown): undefined {
    if (error instanceof FrameEncodeError || !(error instanceof TransportError)) {
      throw error;
    }

    this.replaceChannel(channel);

    if (!(error instanceof ChannelTimeoutError)) {
      throw error;
    }
    if (this.raiseOnError) {
      throw new RequestTimeoutError(this.addressString, this.timeoutMs, error);
    }
    this.record('timeout', TIMEOUT_DIAGNOSTIC);
    return undefined;
  }

  private replaceChannel(stale: Channel): void {
    stale.close();
    // disconnect() may have run while the request was in flight
    if (!this.connected || this.channel !== stale) {
      return;
    }

    log.info(`Replacing channel to ${this.addressString}`);
    try {
      this.channel = this.openChannel();
    } catch (error) {
      this.channel = null;
      this.connected = false;
      throw error;
    }
  }

  private classify(envelope: ResponseEnvelope): unknown {
    const { message, error } = envelope;
    if (!error) {
      return message;
    }

    switch (error.kind) {
      case 'text':
        this.record('text', error.text);
        return message;

      case 'warning':
        this.onWarning(error.text);
        return message;

      case 'exception':
        if (this.raiseOnError) {
          throw new ServerError(error.exception);
        }
        this.record(
          'exception',
          `Server raised the following exception: ${describeEnvelopeError(error)}`
        );
        return message;

      case 'unrecognized': {
        const description = describeEnvelopeError(error);
        if (this.raiseOnError) {
          throw new UnrecognizedErrorShapeError(error.raw, description);
        }
        this.record('unrecognized', `Unknown error type: ${description}`);
        return message;
      }
    }
  }

  private record(kind: DiagnosticKind, message: string): void {
    log.info(message);
    this.diagnostics.push({ kind, message, timestamp: Date.now() });
    if (this.diagnostics.length > MAX_SESSION_DIAGNOSTICS) {
      this.diagnostics.shift();
    }
  }
}
