/**
 * Bounded async queue
 *
 * Many producers, one consumer. A producer that finds the queue full
 * suspends in push() until the consumer makes room; close() releases
 * every suspended producer with `false` and ends the consumer.
 */

interface PendingPush<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

export class BoundedQueue<T extends {}> {
  private readonly items: T[] = [];
  private readonly pendingPushes: PendingPush<T>[] = [];
  private pendingShift: ((item: T | undefined) => void) | undefined;
  private closed = false;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get waitingProducers(): number {
    return this.pendingPushes.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves true once the item is queued, false if the queue is closed
   */
  push(item: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    if (this.pendingShift) {
      const deliver = this.pendingShift;
      this.pendingShift = undefined;
      deliver(item);
      return Promise.resolve(true);
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.pendingPushes.push({ item, resolve });
    });
  }

  /**
   * Resolves with the next item, or undefined once the queue is closed
   */
  shift(): Promise<T | undefined> {
    const head = this.items.shift();
    if (head !== undefined) {
      this.admitPendingPush();
      return Promise.resolve(head);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>((resolve) => {
      this.pendingShift = resolve;
    });
  }

  /**
   * Drops queued items and releases everyone waiting
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.items.length = 0;

    for (const pending of this.pendingPushes.splice(0)) {
      pending.resolve(false);
    }

    const consumer = this.pendingShift;
    this.pendingShift = undefined;
    consumer?.(undefined);
  }

  private admitPendingPush(): void {
    const next = this.pendingPushes.shift();
    if (next) {
      this.items.push(next.item);
      next.resolve(true);
    }
  }
}
