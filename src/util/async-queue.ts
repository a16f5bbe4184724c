import { Deferred } from "./deferred.js";

/**
 * Unbounded FIFO with one or more async consumers. `close()` lets consumers
 * drain what is already queued, then iteration ends.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: Array<{ value: T }> = [];
  private waiters: Array<Deferred<IteratorResult<T>>> = [];
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  /** Returns false when the queue is already closed; the item is not queued. */
  push(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push({ value: item });
    }
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) waiter.resolve({ value: undefined, done: true });
    this.waiters = [];
  }

  /** Drop everything still queued. */
  clear(): T[] {
    const dropped = this.items.map((box) => box.value);
    this.items = [];
    return dropped;
  }

  next(): Promise<IteratorResult<T>> {
    const box = this.items.shift();
    if (box) return Promise.resolve({ value: box.value, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    const waiter = new Deferred<IteratorResult<T>>();
    this.waiters.push(waiter);
    return waiter.promise;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
