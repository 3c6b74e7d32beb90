/**
 * Unit tests for the response envelope decoder
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  decodeEnvelopeError,
  decodeResponseEnvelope,
  describeEnvelopeError,
  encodeResponseEnvelope,
} from '@/protocol/index.js';

void describe('decodeEnvelopeError', () => {
  void it('returns null for null and missing errors', () => {
    assert.equal(decodeEnvelopeError(null), null);
    assert.equal(decodeEnvelopeError(undefined), null);
  });

  void it('decodes plain strings as text errors', () => {
    assert.deepEqual(decodeEnvelopeError('Instrument busy'), {
      kind: 'text',
      text: 'Instrument busy',
    });
  });

  void it('decodes a lone warning key', () => {
    assert.deepEqual(decodeEnvelopeError({ warning: 'Value clipped' }), {
      kind: 'warning',
      text: 'Value clipped',
    });
  });

  void it('decodes structured exceptions', () => {
    assert.deepEqual(
      decodeEnvelopeError({ exception: { kind: 'ValueError', detail: 'bad channel' } }),
      { kind: 'exception', exception: { kind: 'ValueError', detail: 'bad channel' } }
    );
  });

  void it('defaults a missing exception detail to an empty string', () => {
    assert.deepEqual(decodeEnvelopeError({ exception: { kind: 'KeyError' } }), {
      kind: 'exception',
      exception: { kind: 'KeyError', detail: '' },
    });
  });

  void it('treats every other shape as unrecognized', () => {
    const shapes: unknown[] = [
      42,
      true,
      ['a'],
      { warning: 7 },
      { warning: 'x', extra: 1 },
      { exception: 'ValueError' },
      { exception: { detail: 'no kind' } },
      { exception: { kind: 'ValueError', detail: 3 } },
    ];

    for (const raw of shapes) {
      assert.deepEqual(decodeEnvelopeError(raw), { kind: 'unrecognized', raw });
    }
  });
});

void describe('decodeResponseEnvelope', () => {
  void it('decodes an object frame', () => {
    assert.deepEqual(decodeResponseEnvelope({ message: [1, 2], error: 'oops' }), {
      message: [1, 2],
      error: { kind: 'text', text: 'oops' },
    });
  });

  void it('leaves message undefined when the frame omits it', () => {
    assert.deepEqual(decodeResponseEnvelope({ error: null }), { message: undefined, error: null });
  });

  void it('treats non-object frames as bare messages', () => {
    assert.deepEqual(decodeResponseEnvelope('pong'), { message: 'pong', error: null });
    assert.deepEqual(decodeResponseEnvelope([1, 2]), { message: [1, 2], error: null });
    assert.deepEqual(decodeResponseEnvelope(null), { message: null, error: null });
  });
});

void describe('encodeResponseEnvelope', () => {
  void it('writes each error kind in its wire form', () => {
    assert.deepEqual(encodeResponseEnvelope({ message: 1, error: null }), {
      message: 1,
      error: null,
    });
    assert.deepEqual(
      encodeResponseEnvelope({ message: 1, error: { kind: 'warning', text: 'w' } }),
      { message: 1, error: { warning: 'w' } }
    );
    assert.deepEqual(
      encodeResponseEnvelope({
        message: null,
        error: { kind: 'exception', exception: { kind: 'RuntimeError', detail: 'x' } },
      }),
      { message: null, error: { exception: { kind: 'RuntimeError', detail: 'x' } } }
    );
  });

  void it('is decoded back to the same envelope', () => {
    const envelope = {
      message: { voltage: 1.5 },
      error: { kind: 'exception' as const, exception: { kind: 'IOError', detail: 'timeout' } },
    };

    assert.deepEqual(decodeResponseEnvelope(encodeResponseEnvelope(envelope)), envelope);
  });
});

void describe('describeEnvelopeError', () => {
  void it('renders each kind on one line', () => {
    assert.equal(describeEnvelopeError({ kind: 'text', text: 'busy' }), 'busy');
    assert.equal(describeEnvelopeError({ kind: 'warning', text: 'clipped' }), 'clipped');
    assert.equal(
      describeEnvelopeError({
        kind: 'exception',
        exception: { kind: 'ValueError', detail: 'bad channel' },
      }),
      'ValueError: bad channel'
    );
    assert.equal(
      describeEnvelopeError({ kind: 'exception', exception: { kind: 'KeyError', detail: '' } }),
      'KeyError'
    );
    assert.equal(describeEnvelopeError({ kind: 'unrecognized', raw: { code: 7 } }), '{"code":7}');
  });
});
