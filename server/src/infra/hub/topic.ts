/**
 * Topic
 * In-memory fan-out channel for one session id.
 *
 * Events live in a fixed ring buffer addressed by a monotonically growing
 * sequence number; every receiver keeps its own cursor into it. A receiver
 * that falls more than `capacity` events behind skips the overwritten ones
 * and is told how many it lost. send() never waits on a receiver.
 */

export const DEFAULT_TOPIC_CAPACITY = 256;

export type ReceiveResult<T> =
  | { kind: 'event'; event: T }
  | { kind: 'lagged'; skipped: number }
  | { kind: 'closed' };

interface Slot<T> {
  event: T;
}

export class Topic<T> {
  private readonly slots: Array<Slot<T> | undefined>;
  private readonly receivers = new Set<TopicReceiver<T>>();
  private tail = 0;
  private closed = false;

  constructor(
    readonly sessionId: string,
    readonly capacity: number = DEFAULT_TOPIC_CAPACITY
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Topic capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Slot<T> | undefined>(capacity).fill(undefined);
  }

  get subscriberCount(): number {
    return this.receivers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Sequence number the next event will get */
  get nextSequence(): number {
    return this.tail;
  }

  /** Oldest sequence number still held in the ring */
  get oldestSequence(): number {
    return Math.max(0, this.tail - this.capacity);
  }

  /**
   * Fan an event out to every current receiver.
   * Returns the number of receivers it was handed to; with none the event is dropped.
   */
  send(event: T): number {
    if (this.closed || this.receivers.size === 0) {
      return 0;
    }

    this.slots[this.tail % this.capacity] = { event };
    this.tail++;

    for (const receiver of this.receivers) {
      receiver.wake();
    }
    return this.receivers.size;
  }

  /**
   * New receiver positioned after the latest event: no backlog replay
   */
  subscribe(): TopicReceiver<T> {
    const receiver = new TopicReceiver(this, this.tail);
    if (this.closed) {
      receiver.close();
      return receiver;
    }
    this.receivers.add(receiver);
    return receiver;
  }

  /**
   * Ends the topic; receivers drain what is buffered, then see `closed`
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.receivers) {
      receiver.wake();
    }
  }

  /** @internal */
  slotAt(sequence: number): Slot<T> | undefined {
    if (sequence < this.oldestSequence || sequence >= this.tail) {
      return undefined;
    }
    return this.slots[sequence % this.capacity];
  }

  /** @internal */
  detach(receiver: TopicReceiver<T>): void {
    this.receivers.delete(receiver);
  }
}

/**
 * One subscriber's view of a topic. Single consumer: at most one recv() pending.
 */
export class TopicReceiver<T> {
  private waiter: (() => void) | undefined;
  private disposed = false;

  constructor(
    private readonly topic: Topic<T>,
    private cursor: number
  ) { }

  get sessionId(): string {
    return this.topic.sessionId;
  }

  get isClosed(): boolean {
    return this.disposed;
  }

  /**
   * Non-blocking receive; undefined when nothing is ready yet
   */
  tryRecv(): ReceiveResult<T> | undefined {
    if (this.disposed) {
      return { kind: 'closed' };
    }

    const oldest = this.topic.oldestSequence;
    if (this.cursor < oldest) {
      const skipped = oldest - this.cursor;
      this.cursor = oldest;
      return { kind: 'lagged', skipped };
    }

    if (this.cursor < this.topic.nextSequence) {
      const slot = this.topic.slotAt(this.cursor);
      this.cursor++;
      if (slot) {
        return { kind: 'event', event: slot.event };
      }
    }

    if (this.topic.isClosed) {
      return { kind: 'closed' };
    }
    return undefined;
  }

  /**
   * Waits for the next event, a lag notice, or closure
   */
  async recv(): Promise<ReceiveResult<T>> {
    for (;;) {
      const ready = this.tryRecv();
      if (ready) {
        return ready;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  /**
   * Dispose the handle: leaves the topic and ends a pending recv()
   */
  close(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.topic.detach(this);
    this.wake();
  }

  /** @internal */
  wake(): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.();
  }
}
