/**
 * ConnectionHub Tests
 * Connection records, topic lifetime and publish fan-out
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConnectionHub } from '../connection-hub.js';
import { HubError } from '../hub-errors.js';
import type { TopicReceiver } from '../topic.js';
import type { SessionEvent } from '../../websocket/websocket-protocol.js';

const SESSION = '6f1c2a54-3d0e-4b8f-9a61-2e7d5c4b3a21';
const OTHER_SESSION = '0b9e8d7c-6a5f-4e3d-8c2b-1a0f9e8d7c6b';

function output(content: string): SessionEvent {
  return { type: 'output', session_id: SESSION, stream: 'stdout', content };
}

describe('ConnectionHub', () => {
  let hub: ConnectionHub;

  beforeEach(() => {
    hub = new ConnectionHub({ topicCapacity: 8 });
  });

  it('subscribe on an unregistered connection throws UNKNOWN_CONNECTION', () => {
    assert.throws(
      () => hub.subscribe('ghost', SESSION),
      (err: unknown) => err instanceof HubError && err.code === 'UNKNOWN_CONNECTION'
    );
  });

  it('register twice resets the subscription set', () => {
    hub.register('c1');
    hub.subscribe('c1', SESSION);
    hub.register('c1');
    assert.deepEqual(hub.subscriptionsOf('c1'), []);
  });

  it('publish with zero subscribers succeeds and leaves no topic', () => {
    assert.equal(hub.publish(SESSION, output('nobody')), 0);
    assert.equal(hub.hasTopic(SESSION), false);
    assert.equal(hub.hasSubscribers(SESSION), false);
  });

  it('delivers exactly one copy per subscribed connection', () => {
    for (const n of [1, 2, 5]) {
      const local = new ConnectionHub();
      const receivers: TopicReceiver<SessionEvent>[] = [];
      for (let i = 0; i < n; i++) {
        local.register(`c${i}`);
        receivers.push(local.subscribe(`c${i}`, SESSION));
      }

      assert.equal(local.publish(SESSION, output('hello')), n);

      for (const receiver of receivers) {
        assert.deepEqual(receiver.tryRecv(), { kind: 'event', event: output('hello') });
        assert.equal(receiver.tryRecv(), undefined);
      }
    }
  });

  it('keeps publish order for one subscriber', () => {
    hub.register('c1');
    const receiver = hub.subscribe('c1', SESSION);

    hub.publish(SESSION, output('1'));
    hub.publish(SESSION, output('2'));
    hub.publish(SESSION, output('3'));

    const seen: string[] = [];
    for (let result = receiver.tryRecv(); result; result = receiver.tryRecv()) {
      if (result.kind === 'event' && result.event.type === 'output') {
        seen.push(result.event.content);
      }
    }
    assert.deepEqual(seen, ['1', '2', '3']);
  });

  it('does not deliver to other sessions', () => {
    hub.register('c1');
    const receiver = hub.subscribe('c1', OTHER_SESSION);
    hub.register('c2');
    hub.subscribe('c2', SESSION);

    hub.publish(SESSION, output('not for you'));
    assert.equal(receiver.tryRecv(), undefined);
  });

  it('unsubscribe is a no-op without a subscription', () => {
    hub.register('c1');
    assert.equal(hub.unsubscribe('c1', SESSION), false);
    assert.equal(hub.unsubscribe('ghost', SESSION), false);
  });

  it('unsubscribe leaves an earlier receiver open', () => {
    hub.register('c1');
    const receiver = hub.subscribe('c1', SESSION);

    assert.equal(hub.unsubscribe('c1', SESSION), true);
    assert.equal(receiver.isClosed, false);
    assert.deepEqual(hub.subscriptionsOf('c1'), []);

    receiver.close();
    assert.equal(hub.reclaim(SESSION), true);
    assert.equal(hub.hasTopic(SESSION), false);
  });

  it('unregister reclaims topics once their receivers are gone', () => {
    hub.register('c1');
    const receiver = hub.subscribe('c1', SESSION);
    receiver.close();

    hub.unregister('c1');

    assert.equal(hub.isRegistered('c1'), false);
    assert.equal(hub.hasTopic(SESSION), false);
    assert.equal(hub.hasSubscribers(SESSION), false);
  });

  it('unregister does not touch other connections on the same topic', () => {
    hub.register('c1');
    hub.register('c2');
    const gone = hub.subscribe('c1', SESSION);
    const stays = hub.subscribe('c2', SESSION);
    gone.close();

    hub.unregister('c1');

    assert.equal(hub.hasTopic(SESSION), true);
    assert.equal(hub.subscriberCount(SESSION), 1);
    assert.equal(hub.publish(SESSION, output('still here')), 1);
    assert.deepEqual(stays.tryRecv(), { kind: 'event', event: output('still here') });
  });

  it('reports stats', () => {
    hub.register('c1');
    hub.register('c2');
    hub.subscribe('c1', SESSION);
    hub.subscribe('c2', SESSION);
    hub.subscribe('c2', OTHER_SESSION);

    assert.deepEqual(hub.getStats(), { connections: 2, topics: 2, subscriptions: 3 });
  });

  it('close ends receivers and refuses new work', async () => {
    hub.register('c1');
    const receiver = hub.subscribe('c1', SESSION);

    hub.close();

    assert.deepEqual(await receiver.recv(), { kind: 'closed' });
    assert.equal(hub.publish(SESSION, output('late')), 0);
    assert.throws(
      () => hub.register('c2'),
      (err: unknown) => err instanceof HubError && err.code === 'HUB_CLOSED'
    );
  });
});
