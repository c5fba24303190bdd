/**
 * Close reason taxonomy tests
 */

import { describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import type { WebSocket } from 'ws';
import { wsClose, getCloseTag, getCloseParams, CloseSource, CLOSE_REASONS } from '../ws-close-reasons.js';

function fakeSocket(close: (code: number, reason: string) => void): WebSocket {
  return { close } as unknown as WebSocket;
}

describe('getCloseParams', () => {
  it('maps each source to its close code and default reason', () => {
    assert.deepEqual(getCloseParams(CloseSource.IDLE_TIMEOUT), { code: 1001, reason: 'IDLE_TIMEOUT' });
    assert.deepEqual(getCloseParams(CloseSource.SERVER_SHUTDOWN), { code: 1001, reason: 'SERVER_SHUTDOWN' });
    assert.deepEqual(getCloseParams(CloseSource.CLIENT_CLOSE), { code: 1000, reason: 'CLIENT_CLOSE' });
    assert.deepEqual(getCloseParams(CloseSource.POLICY), { code: 1008, reason: 'POLICY_VIOLATION' });
    assert.deepEqual(getCloseParams(CloseSource.ERROR), { code: 1011, reason: 'UNEXPECTED_ERROR' });
  });

  it('keeps an explicit reason', () => {
    assert.deepEqual(
      getCloseParams(CloseSource.IDLE_TIMEOUT, CLOSE_REASONS.HEARTBEAT_TIMEOUT),
      { code: 1001, reason: 'HEARTBEAT_TIMEOUT' }
    );
  });
});

describe('wsClose', () => {
  it('closes with the given code and tags the socket', () => {
    const close = mock.fn((_code: number, _reason: string) => undefined);
    const ws = fakeSocket(close);

    wsClose(ws, { code: 1011, reason: CLOSE_REASONS.SEND_FAILED, closeSource: CloseSource.ERROR });

    assert.deepEqual(close.mock.calls[0]?.arguments, [1011, 'SEND_FAILED']);
    assert.deepEqual(getCloseTag(ws), { closeSource: CloseSource.ERROR, reason: 'SEND_FAILED' });
  });

  it('substitutes UNKNOWN for a blank reason', () => {
    const close = mock.fn((_code: number, _reason: string) => undefined);
    wsClose(fakeSocket(close), { code: 1000, reason: '  ', closeSource: CloseSource.CLIENT_CLOSE });
    assert.deepEqual(close.mock.calls[0]?.arguments, [1000, 'UNKNOWN']);
  });

  it('does not throw when the socket refuses to close', () => {
    const ws = fakeSocket(() => {
      throw new Error('already closed');
    });
    assert.doesNotThrow(() => {
      wsClose(ws, { code: 1001, reason: 'SERVER_SHUTDOWN', closeSource: CloseSource.SERVER_SHUTDOWN });
    });
  });

  it('reports CLIENT_CLOSE for sockets it never closed', () => {
    const ws = fakeSocket(() => undefined);
    assert.deepEqual(getCloseTag(ws), { closeSource: CloseSource.CLIENT_CLOSE });
  });
});
