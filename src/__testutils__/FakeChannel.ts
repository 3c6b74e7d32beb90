/**
 * FakeChannel - scripted Channel for session unit tests
 *
 * Replies come from a script shared by every channel a factory creates, so a
 * test can follow a session across channel replacements.
 */

import {
  ChannelStateError,
  ChannelTimeoutError,
  formatAddress,
  type Address,
  type Channel,
  type ChannelFactory,
} from '@/transport/index.js';

export type ScriptedOutcome =
  | { reply: unknown }
  | { error: Error }
  | { timeout: true };

export class FakeChannel implements Channel {
  public address: Address | null = null;
  public timeoutMs = 0;
  public closed = false;
  public failed = false;
  public readonly sent: unknown[] = [];
  private awaitingReply = false;

  constructor(private readonly script: ScriptedOutcome[]) {}

  setReceiveTimeout(timeoutMs: number): void {
    this.timeoutMs = timeoutMs;
  }

  bind(address: Address): void {
    this.address = address;
  }

  send(message: unknown): void {
    if (this.closed) {
      throw new ChannelStateError('closed');
    }
    if (this.awaitingReply) {
      throw new ChannelStateError('send twice');
    }
    this.sent.push(message);
    this.awaitingReply = true;
  }

  async receive(): Promise<unknown> {
    if (!this.awaitingReply) {
      throw new ChannelStateError('receive before send');
    }
    const outcome = this.script.shift();
    if (!outcome) {
      throw new Error('FakeChannel script exhausted');
    }
    if ('timeout' in outcome) {
      throw new ChannelTimeoutError(this.label(), this.timeoutMs);
    }
    if ('error' in outcome) {
      throw outcome.error;
    }
    this.awaitingReply = false;
    return outcome.reply;
  }

  isReady(): boolean {
    return !this.closed && !this.failed && !this.awaitingReply && this.address !== null;
  }

  close(): void {
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  private label(): string {
    return this.address ? formatAddress(this.address) : 'tcp://<unbound>';
  }
}

/**
 * Channel factory that records every channel it builds.
 */
export class FakeChannelFactory {
  public readonly channels: FakeChannel[] = [];
  public readonly script: ScriptedOutcome[] = [];

  readonly create: ChannelFactory = () => {
    const channel = new FakeChannel(this.script);
    this.channels.push(channel);
    return channel;
  };

  enqueue(...outcomes: ScriptedOutcome[]): this {
    this.script.push(...outcomes);
    return this;
  }

  /** Most recently created channel */
  get current(): FakeChannel {
    const channel = this.channels[this.channels.length - 1];
    if (!channel) {
      throw new Error('No channel created yet');
    }
    return channel;
  }

  /** Every message sent on any channel, in order */
  get sent(): unknown[] {
    return this.channels.flatMap((channel) => channel.sent);
  }
}
