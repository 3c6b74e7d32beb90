/**
 * Request/reply channel over a single TCP connection.
 *
 * Strict alternation: every `send` must be followed by a `receive` before the
 * next `send`. A receive that times out leaves the channel waiting for a reply
 * that may still arrive later, so the channel refuses further sends and the
 * owner has to close it and open a new one. The same holds once a frame
 * arrives while no request is outstanding.
 */

import type { Socket } from 'net';

import { DEFAULT_REQUEST_TIMEOUT_MS } from '@/constants.js';
import { createLogger } from '@/ui/logging/index.js';

import { formatAddress, type Address } from './address.js';
import { formatConnectionError } from './errors.js';
import { JSONLBuffer, parseJSONLFrame, toJSONLFrame } from './jsonl.js';
import { createSocket } from './socket.js';
import {
  ChannelClosedError,
  ChannelStateError,
  ChannelTimeoutError,
  TransportError,
} from './TransportError.js';

const log = createLogger('transport');

/**
 * Channel operations the client session relies on.
 */
export interface Channel {
  /** Time `receive` waits for a reply before rejecting with ChannelTimeoutError. */
  setReceiveTimeout(timeoutMs: number): void;
  /** Open the connection to `address`. A channel binds once. */
  bind(address: Address): void;
  /** Encode and transmit one request frame. */
  send(message: unknown): void;
  /** Wait for the reply to the last request. */
  receive(): Promise<unknown>;
  /** Bound, open, idle and without a connection failure. */
  isReady(): boolean;
  /** Destroy the connection. Pending receives reject. Idempotent. */
  close(): void;
  isClosed(): boolean;
}

/**
 * Builds unbound channels for a session.
 */
export type ChannelFactory = () => Channel;

type ChannelPhase = 'idle' | 'awaiting-reply';

interface PendingReceive {
  resolve: (reply: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * JSONL-over-TCP implementation of {@link Channel}.
 */
export class TransportChannel implements Channel {
  private socket: Socket | null = null;
  private cleanup: (() => void) | null = null;
  private label = 'tcp://<unbound>';
  private receiveTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS;
  private phase: ChannelPhase = 'idle';
  private closed = false;
  private failure: TransportError | null = null;
  private pending: PendingReceive | null = null;
  private readonly buffer = new JSONLBuffer();
  private readonly frames: string[] = [];

  setReceiveTimeout(timeoutMs: number): void {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new RangeError(`Receive timeout must be a positive number, got ${timeoutMs}`);
    }
    this.receiveTimeoutMs = timeoutMs;
  }

  bind(address: Address): void {
    this.assertOpen('bind');
    if (this.socket) {
      throw new ChannelStateError(`Channel is already bound to ${this.label}`);
    }

    this.label = formatAddress(address);
    const { socket, cleanup } = createSocket(address, {
      onData: (chunk) => this.handleData(chunk),
      onError: (error) => this.fail(formatConnectionError(this.label, error)),
      onClose: () => this.fail(new ChannelClosedError(this.label)),
    });
    this.socket = socket;
    this.cleanup = cleanup;
  }

  send(message: unknown): void {
    this.assertOpen('send');
    if (!this.socket) {
      throw new ChannelStateError('Cannot send on a channel that is not bound');
    }
    if (this.phase === 'awaiting-reply') {
      throw new ChannelStateError(
        `Cannot send on ${this.label}: the previous request has not received its reply`
      );
    }
    if (this.failure) {
      throw this.failure;
    }

    // Encoding errors surface before the phase changes
    const frame = toJSONLFrame(message);
    this.socket.write(frame);
    this.phase = 'awaiting-reply';
    log.debug(`Request sent to ${this.label} (${frame.length} bytes)`);
  }

  async receive(): Promise<unknown> {
    this.assertOpen('receive');
    if (this.phase !== 'awaiting-reply') {
      throw new ChannelStateError(`Cannot receive on ${this.label} before sending a request`);
    }
    if (this.pending) {
      throw new ChannelStateError(`A receive is already pending on ${this.label}`);
    }

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        const timeout = new ChannelTimeoutError(this.label, this.receiveTimeoutMs);
        this.settle((waiter) => waiter.reject(timeout));
      }, this.receiveTimeoutMs);
      this.pending = { resolve, reject, timer };

      if (this.frames.length > 0) {
        this.deliver();
      } else if (this.failure) {
        const failure = this.failure;
        this.settle((waiter) => waiter.reject(failure));
      }
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const closedLocally = new ChannelClosedError(this.label, 'channel closed locally');
    this.settle((waiter) => waiter.reject(closedLocally));
    if (this.buffer.hasPartialFrame()) {
      log.debug(`Discarding partial frame from ${this.label}`);
    }
    this.cleanup?.();
    this.socket = null;
    this.cleanup = null;
    this.buffer.clear();
    this.frames.length = 0;
    log.debug(`Channel to ${this.label} closed`);
  }

  isClosed(): boolean {
    return this.closed;
  }

  isReady(): boolean {
    return !this.closed && this.socket !== null && this.phase === 'idle' && this.failure === null;
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new ChannelStateError(`Cannot ${operation} on a closed channel (${this.label})`);
    }
  }

  private handleData(chunk: string): void {
    for (const line of this.buffer.process(chunk)) {
      this.frames.push(line);
    }
    this.deliver();

    // A frame with no request outstanding would be paired with the next request
    if (this.phase === 'idle' && this.frames.length > 0) {
      log.debug(`Dropping ${this.frames.length} unsolicited frame(s) from ${this.label}`);
      this.frames.length = 0;
      this.fail(new ChannelStateError(`Unsolicited reply from ${this.label}`));
    }
  }

  private deliver(): void {
    if (!this.pending) {
      return;
    }
    const line = this.frames.shift();
    if (line === undefined) {
      return;
    }

    try {
      const reply = parseJSONLFrame(line);
      this.phase = 'idle';
      this.settle((waiter) => waiter.resolve(reply));
    } catch (error) {
      const failure = error instanceof TransportError ? error : new TransportError(String(error));
      this.settle((waiter) => waiter.reject(failure));
    }
  }

  private fail(error: TransportError): void {
    if (this.closed) {
      return;
    }
    this.failure ??= error;
    const failure = this.failure;
    this.settle((waiter) => waiter.reject(failure));
  }

  private settle(action: (waiter: PendingReceive) => void): void {
    const waiter = this.pending;
    if (!waiter) {
      return;
    }
    this.pending = null;
    clearTimeout(waiter.timer);
    action(waiter);
  }
}

/**
 * Default factory: a fresh, unbound TCP channel.
 */
export const createTransportChannel: ChannelFactory = () => new TransportChannel();
