/**
 * Message Codec Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  decodeClientMessage,
  decodeServerMessage,
  encodeServerMessage,
  encodeClientMessage,
  DECODE_ERROR_PREFIX
} from '../message-codec.js';

const SESSION = '6f1c2a54-3d0e-4b8f-9a61-2e7d5c4b3a21';

describe('decodeClientMessage', () => {
  it('decodes every command', () => {
    assert.deepEqual(decodeClientMessage(`{"type":"subscribe","session_id":"${SESSION}"}`), {
      ok: true,
      message: { type: 'subscribe', session_id: SESSION }
    });
    assert.deepEqual(decodeClientMessage(`{"type":"unsubscribe","session_id":"${SESSION}"}`), {
      ok: true,
      message: { type: 'unsubscribe', session_id: SESSION }
    });
    assert.deepEqual(decodeClientMessage(`{"type":"cancel","session_id":"${SESSION}"}`), {
      ok: true,
      message: { type: 'cancel', session_id: SESSION }
    });
    assert.deepEqual(decodeClientMessage('{"type":"ping"}'), {
      ok: true,
      message: { type: 'ping' }
    });
  });

  it('canonicalizes session ids to lowercase hyphenated form', () => {
    const upper = SESSION.toUpperCase();
    const bare = SESSION.replace(/-/g, '');

    assert.deepEqual(decodeClientMessage(`{"type":"subscribe","session_id":"${upper}"}`), {
      ok: true,
      message: { type: 'subscribe', session_id: SESSION }
    });
    assert.deepEqual(decodeClientMessage(`{"type":"cancel","session_id":"${bare}"}`), {
      ok: true,
      message: { type: 'cancel', session_id: SESSION }
    });
  });

  it('reports unparseable JSON as a parse error', () => {
    const result = decodeClientMessage('not json');
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.reason, 'parse_error');
      assert.ok(result.error.startsWith(`${DECODE_ERROR_PREFIX}: `));
    }
  });

  it('rejects a session id that is not a UUID', () => {
    assert.deepEqual(decodeClientMessage('{"type":"subscribe","session_id":"abc"}'), {
      ok: false,
      reason: 'invalid_format',
      error: 'Invalid message format: session_id: Invalid uuid'
    });
  });

  it('rejects a missing session id', () => {
    assert.deepEqual(decodeClientMessage('{"type":"cancel"}'), {
      ok: false,
      reason: 'invalid_format',
      error: 'Invalid message format: session_id: Required'
    });
  });

  it('rejects an unknown type', () => {
    const result = decodeClientMessage('{"type":"shout"}');
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.reason, 'invalid_format');
      assert.ok(result.error.startsWith('Invalid message format: type: Invalid discriminator value'));
    }
  });

  it('rejects a frame that is not an object', () => {
    const result = decodeClientMessage('42');
    assert.equal(result.ok, false);
    if (!result.ok) {
      assert.equal(result.reason, 'invalid_format');
      assert.ok(result.error.startsWith('Invalid message format: message: '));
    }
  });
});

describe('encodeServerMessage', () => {
  it('writes snake_case tagged JSON', () => {
    assert.equal(
      encodeServerMessage({ type: 'output', session_id: SESSION, stream: 'stderr', content: 'boom' }),
      `{"type":"output","session_id":"${SESSION}","stream":"stderr","content":"boom"}`
    );
    assert.equal(encodeServerMessage({ type: 'pong' }), '{"type":"pong"}');
  });

  it('is read back by decodeServerMessage', () => {
    const frame = encodeServerMessage({ type: 'status', session_id: SESSION, status: 'cancelled' });
    assert.deepEqual(decodeServerMessage(frame), {
      ok: true,
      message: { type: 'status', session_id: SESSION, status: 'cancelled' }
    });
  });

  it('client frames are accepted by the server decoder', () => {
    const frame = encodeClientMessage({ type: 'unsubscribe', session_id: SESSION });
    assert.equal(frame, `{"type":"unsubscribe","session_id":"${SESSION}"}`);
    assert.equal(decodeClientMessage(frame).ok, true);
  });
});

describe('decodeServerMessage', () => {
  it('rejects an unknown stream name', () => {
    const result = decodeServerMessage(`{"type":"output","session_id":"${SESSION}","stream":"stdin","content":"x"}`);
    assert.equal(result.ok, false);
  });
});
