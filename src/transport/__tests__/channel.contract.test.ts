/**
 * TransportChannel Contract Tests
 *
 * Real TCP connections against an in-process fake server.
 *
 * Contract:
 * - send → receive returns the server's reply frame
 * - strict alternation of send and receive
 * - timeouts, malformed frames, early close and refused connections reject receive
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import {
  FAKE_SERVER_HOST,
  FakeInstrumentServer,
  assertEventually,
} from '@/__testutils__/index.js';
import {
  ChannelClosedError,
  ChannelConnectionError,
  ChannelStateError,
  ChannelTimeoutError,
  FrameParseError,
  TransportChannel,
} from '@/transport/index.js';

void describe('TransportChannel Contract Tests', () => {
  let server: FakeInstrumentServer;
  let channel: TransportChannel;

  const bindChannel = (timeoutMs = 1000): TransportChannel => {
    channel = new TransportChannel();
    channel.setReceiveTimeout(timeoutMs);
    channel.bind({ host: FAKE_SERVER_HOST, port: server.port });
    return channel;
  };

  beforeEach(async () => {
    server = new FakeInstrumentServer();
    await server.start();
  });

  afterEach(async () => {
    channel.close();
    await server.stop();
  });

  void describe('request/reply', () => {
    void it('returns the reply frame for a request', async () => {
      bindChannel();

      channel.send({ operation: 'get', target: 'dmm.voltage' });
      const reply = await channel.receive();

      assert.deepEqual(reply, {
        message: { operation: 'get', target: 'dmm.voltage' },
        error: null,
      });
      assert.deepEqual(server.requests, [{ operation: 'get', target: 'dmm.voltage' }]);
    });

    void it('handles consecutive requests on one connection', async () => {
      bindChannel();

      channel.send('ping');
      assert.deepEqual(await channel.receive(), { message: 'pong', error: null });
      channel.send('again');
      assert.deepEqual(await channel.receive(), { message: 'again', error: null });
      assert.equal(server.connectionCount, 1);
    });

    void it('is ready when idle and busy while awaiting a reply', async () => {
      bindChannel();
      assert.equal(channel.isReady(), true);

      channel.send('ping');
      assert.equal(channel.isReady(), false);

      await channel.receive();
      assert.equal(channel.isReady(), true);
    });
  });

  void describe('alternation', () => {
    void it('refuses a second send before the reply', () => {
      bindChannel();
      channel.send('ping');

      assert.throws(() => channel.send('ping'), ChannelStateError);
    });

    void it('refuses receive before send', async () => {
      bindChannel();

      await assert.rejects(channel.receive(), ChannelStateError);
    });

    void it('refuses send on an unbound channel', () => {
      channel = new TransportChannel();

      assert.throws(() => channel.send('ping'), ChannelStateError);
    });
  });

  void describe('failures', () => {
    void it('times out when the server stays silent and keeps refusing sends', async () => {
      server.mode = 'silent';
      bindChannel(100);

      channel.send('ping');
      await assert.rejects(channel.receive(), (error: unknown) => {
        assert.ok(error instanceof ChannelTimeoutError);
        assert.equal(error.timeoutMs, 100);
        return true;
      });
      assert.throws(() => channel.send('ping'), ChannelStateError);
      assert.equal(channel.isReady(), false);
    });

    void it('stops accepting requests after an unsolicited reply', async () => {
      server.mode = 'duplicate';
      bindChannel();

      channel.send('ping');
      assert.deepEqual(await channel.receive(), { message: 'pong', error: null });
      await assertEventually(() => !channel.isReady(), 1000);

      assert.throws(() => channel.send('again'), {
        name: 'ChannelStateError',
        message: `Unsolicited reply from tcp://${FAKE_SERVER_HOST}:${server.port}`,
      });
      assert.deepEqual(server.requests, ['ping']);
    });

    void it('rejects with FrameParseError on a malformed reply', async () => {
      server.mode = 'malformed';
      bindChannel();

      channel.send('ping');
      await assert.rejects(channel.receive(), FrameParseError);
    });

    void it('rejects with ChannelClosedError when the server hangs up', async () => {
      server.mode = 'close_early';
      bindChannel();

      channel.send('ping');
      await assert.rejects(channel.receive(), ChannelClosedError);
    });

    void it('rejects with ChannelConnectionError when nothing listens', async () => {
      const port = server.port;
      await server.stop();

      channel = new TransportChannel();
      channel.setReceiveTimeout(1000);
      channel.bind({ host: FAKE_SERVER_HOST, port });
      channel.send('ping');

      await assert.rejects(channel.receive(), (error: unknown) => {
        assert.ok(error instanceof ChannelConnectionError);
        assert.equal(error.code, 'ECONNREFUSED');
        return true;
      });
    });
  });

  void describe('close()', () => {
    void it('rejects a pending receive', async () => {
      server.mode = 'silent';
      bindChannel();
      channel.send('ping');

      const pending = channel.receive();
      channel.close();

      await assert.rejects(pending, ChannelClosedError);
      assert.equal(channel.isClosed(), true);
    });

    void it('makes every later operation fail', async () => {
      bindChannel();
      channel.close();

      assert.throws(() => channel.send('ping'), ChannelStateError);
      await assert.rejects(channel.receive(), ChannelStateError);
      assert.throws(
        () => channel.bind({ host: FAKE_SERVER_HOST, port: server.port }),
        ChannelStateError
      );
    });

    void it('is idempotent', () => {
      bindChannel();
      channel.close();
      channel.close();

      assert.equal(channel.isClosed(), true);
    });
  });

  void describe('setReceiveTimeout()', () => {
    void it('rejects non-positive values', () => {
      channel = new TransportChannel();

      assert.throws(() => channel.setReceiveTimeout(0), RangeError);
    });
  });
});
