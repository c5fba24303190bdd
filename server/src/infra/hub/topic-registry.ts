/**
 * Topic Registry
 * Lazily creates topics keyed by session id and reclaims orphaned ones.
 *
 * All methods run to completion on the event loop, so a check-then-remove
 * in removeIfOrphaned() cannot interleave with a subscribe().
 */

import { Topic, DEFAULT_TOPIC_CAPACITY } from './topic.js';

export class TopicRegistry<T> {
  private readonly topics = new Map<string, Topic<T>>();

  constructor(private readonly capacity: number = DEFAULT_TOPIC_CAPACITY) { }

  get size(): number {
    return this.topics.size;
  }

  /**
   * Existing topic for the session, or a new one. Never fails.
   */
  getOrCreateSender(sessionId: string): Topic<T> {
    let topic = this.topics.get(sessionId);
    if (!topic) {
      topic = new Topic<T>(sessionId, this.capacity);
      this.topics.set(sessionId, topic);
    }
    return topic;
  }

  get(sessionId: string): Topic<T> | undefined {
    return this.topics.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.topics.has(sessionId);
  }

  /**
   * Drop the topic if nobody is subscribed. Returns true when it was removed.
   */
  removeIfOrphaned(sessionId: string): boolean {
    const topic = this.topics.get(sessionId);
    if (!topic || topic.subscriberCount > 0) {
      return false;
    }
    this.topics.delete(sessionId);
    topic.close();
    return true;
  }

  /** Advisory: may be stale by the time the caller acts on it */
  subscriberCount(sessionId: string): number {
    return this.topics.get(sessionId)?.subscriberCount ?? 0;
  }

  totalSubscribers(): number {
    let total = 0;
    for (const topic of this.topics.values()) {
      total += topic.subscriberCount;
    }
    return total;
  }

  /**
   * Close and forget every topic (shutdown)
   */
  closeAll(): void {
    for (const topic of this.topics.values()) {
      topic.close();
    }
    this.topics.clear();
  }
}
