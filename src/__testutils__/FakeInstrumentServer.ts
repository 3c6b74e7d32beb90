/**
 * FakeInstrumentServer - in-process JSONL/TCP server for contract tests
 *
 * Listens on 127.0.0.1 with an ephemeral port and answers each request frame
 * according to `mode`.
 */

import * as net from 'node:net';

import { encodeResponseEnvelope, type ResponseEnvelope } from '@/protocol/index.js';

export type FakeServerMode =
  | 'normal' // Reply through `handler`
  | 'silent' // Accept requests, never reply
  | 'malformed' // Reply with invalid JSON
  | 'duplicate' // Send every reply twice, in one write
  | 'close_early'; // Close the connection instead of replying

export type RequestHandler = (request: unknown) => ResponseEnvelope;

export const FAKE_SERVER_HOST = '127.0.0.1';

/**
 * Default behaviour: "ping" → "pong", anything else is echoed back.
 */
export const echoHandler: RequestHandler = (request) => ({
  message: request === 'ping' ? 'pong' : request,
  error: null,
});

export class FakeInstrumentServer {
  private server: net.Server | null = null;
  private sockets = new Set<net.Socket>();
  private assignedPort = 0;

  public mode: FakeServerMode = 'normal';
  public handler: RequestHandler = echoHandler;
  /** Every request frame received, in arrival order */
  public readonly requests: unknown[] = [];
  /** Number of TCP connections accepted so far */
  public connectionCount = 0;

  get port(): number {
    return this.assignedPort;
  }

  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server = net.createServer((socket) => this.accept(socket));
      this.server.once('error', reject);
      this.server.listen(0, FAKE_SERVER_HOST, () => {
        const address = this.server?.address();
        if (address === null || address === undefined || typeof address === 'string') {
          reject(new Error('Fake server has no TCP address'));
          return;
        }
        this.assignedPort = address.port;
        resolve(address.port);
      });
    });
  }

  async stop(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }

  private accept(socket: net.Socket): void {
    this.connectionCount++;
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => {
      // Client resets are expected when sessions replace channels
    });

    let buffer = '';
    socket.on('data', (chunk: Buffer) => {
      buffer += chunk.toString('utf-8');
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        if (line.trim()) {
          this.respond(socket, line);
        }
      }
    });
  }

  private respond(socket: net.Socket, line: string): void {
    const request: unknown = JSON.parse(line);
    this.requests.push(request);

    switch (this.mode) {
      case 'silent':
        break;
      case 'malformed':
        socket.write('{"message": oops}\n');
        break;
      case 'close_early':
        socket.end();
        break;
      case 'normal':
        socket.write(this.replyFrame(request));
        break;
      case 'duplicate': {
        const frame = this.replyFrame(request);
        socket.write(frame + frame);
        break;
      }
    }
  }

  private replyFrame(request: unknown): string {
    return JSON.stringify(encodeResponseEnvelope(this.handler(request))) + '\n';
  }
}
