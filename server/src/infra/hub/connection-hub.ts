/**
 * Connection Hub
 * Topic registry + per-connection subscription records.
 *
 * Every operation is synchronous. On the single-threaded event loop that
 * makes each one an exclusive section: structural changes (topic insert and
 * removal, connection records, subscription sets) never interleave with
 * each other or with publish lookups.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import type { SessionEvent } from '../websocket/websocket-protocol.js';
import { TopicRegistry } from './topic-registry.js';
import type { TopicReceiver } from './topic.js';
import { DEFAULT_TOPIC_CAPACITY } from './topic.js';
import { HubError } from './hub-errors.js';
import { SessionPublisher } from './session-publisher.js';
import type { SessionEventSink } from './session-publisher.js';

export interface ConnectionHubOptions {
  topicCapacity?: number;
}

export interface HubStats {
  connections: number;
  topics: number;
  subscriptions: number;
}

export class ConnectionHub implements SessionEventSink {
  private readonly registry: TopicRegistry<SessionEvent>;
  // connectionId -> subscribed session ids
  private readonly connections = new Map<string, Set<string>>();
  private closed = false;

  constructor(options: ConnectionHubOptions = {}) {
    this.registry = new TopicRegistry<SessionEvent>(options.topicCapacity ?? DEFAULT_TOPIC_CAPACITY);
  }

  /**
   * Start tracking a connection with an empty subscription set.
   * Registering an id twice resets its set.
   */
  register(connectionId: string): void {
    if (this.closed) {
      throw new HubError('Hub is closed', 'HUB_CLOSED');
    }
    this.connections.set(connectionId, new Set());
    logger.debug({ connectionId, connections: this.connections.size }, 'Hub: connection registered');
  }

  /**
   * Forget a connection and reclaim every topic it leaves orphaned.
   * Other connections' receivers on the same topics are untouched.
   */
  unregister(connectionId: string): void {
    const sessions = this.connections.get(connectionId);
    if (!sessions) {
      return;
    }
    this.connections.delete(connectionId);

    let reclaimed = 0;
    for (const sessionId of sessions) {
      if (this.registry.removeIfOrphaned(sessionId)) {
        reclaimed++;
      }
    }

    logger.debug({
      connectionId,
      sessions: sessions.size,
      reclaimed,
      connections: this.connections.size
    }, 'Hub: connection unregistered');
  }

  /**
   * Join a session topic, creating it if needed.
   * The receiver sees events published after this call only.
   */
  subscribe(connectionId: string, sessionId: string): TopicReceiver<SessionEvent> {
    if (this.closed) {
      throw new HubError('Hub is closed', 'HUB_CLOSED');
    }
    const sessions = this.connections.get(connectionId);
    if (!sessions) {
      throw new HubError(`Connection ${connectionId} is not registered`, 'UNKNOWN_CONNECTION');
    }

    sessions.add(sessionId);
    const receiver = this.registry.getOrCreateSender(sessionId).subscribe();

    logger.debug({
      connectionId,
      sessionId,
      subscriberCount: this.registry.subscriberCount(sessionId)
    }, 'Hub: subscribed');

    return receiver;
  }

  /**
   * Leave a session. Receivers handed out earlier stay open; disposing
   * them is the caller's job. Returns false when there was nothing to leave.
   */
  unsubscribe(connectionId: string, sessionId: string): boolean {
    const removed = this.connections.get(connectionId)?.delete(sessionId) ?? false;
    logger.debug({ connectionId, sessionId, removed }, 'Hub: unsubscribed');
    return removed;
  }

  /**
   * Deliver an event to a session's subscribers without waiting on any of them.
   * Returns how many receivers got it; zero is a successful no-op.
   */
  publish(sessionId: string, event: SessionEvent): number {
    if (this.closed) {
      return 0;
    }

    const delivered = this.registry.getOrCreateSender(sessionId).send(event);
    if (delivered === 0) {
      this.registry.removeIfOrphaned(sessionId);
    }
    return delivered;
  }

  hasSubscribers(sessionId: string): boolean {
    return this.registry.subscriberCount(sessionId) > 0;
  }

  subscriberCount(sessionId: string): number {
    return this.registry.subscriberCount(sessionId);
  }

  /**
   * Re-check a topic after a receiver was disposed
   */
  reclaim(sessionId: string): boolean {
    return this.registry.removeIfOrphaned(sessionId);
  }

  hasTopic(sessionId: string): boolean {
    return this.registry.has(sessionId);
  }

  isRegistered(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  subscriptionsOf(connectionId: string): string[] {
    return Array.from(this.connections.get(connectionId) ?? []);
  }

  publisher(sessionId: string): SessionPublisher {
    return new SessionPublisher(this, sessionId);
  }

  getStats(): HubStats {
    return {
      connections: this.connections.size,
      topics: this.registry.size,
      subscriptions: this.registry.totalSubscribers()
    };
  }

  /**
   * Shutdown: end every topic so forwarding receivers drain and stop
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.registry.closeAll();
    this.connections.clear();
    logger.info('Hub: closed');
  }
}
