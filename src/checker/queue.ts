/**
 * Async work queue shared by the loader (producer) and the pool workers (consumers).
 *
 * `dequeue()` waits while the queue is empty and open, and resolves `{ done: true }`
 * once the queue is closed and drained. With a finite capacity, `enqueue()` waits
 * for room instead of growing the buffer.
 */

import { QueueClosedError } from "./errors.js";

export type QueueResult<T> = { done: false; value: T } | { done: true };

export class AsyncQueue<T> implements AsyncIterable<T> {
  // Wrapped so that `T` itself may include undefined.
  private readonly items: { value: T }[] = [];
  private readonly takers: ((result: QueueResult<T>) => void)[] = [];
  private readonly putters: (() => void)[] = [];
  private closed = false;

  constructor(private readonly capacity = Number.POSITIVE_INFINITY) {
    if (!(capacity >= 1)) {
      throw new RangeError(`Queue capacity must be at least 1, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async enqueue(value: T): Promise<void> {
    for (;;) {
      if (this.closed) throw new QueueClosedError();

      const taker = this.takers.shift();
      if (taker) {
        taker({ done: false, value });
        return;
      }
      if (this.items.length < this.capacity) {
        this.items.push({ value });
        return;
      }
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
  }

  dequeue(): Promise<QueueResult<T>> {
    const head = this.items.shift();
    if (head) {
      this.putters.shift()?.();
      return Promise.resolve({ done: false, value: head.value });
    }
    if (this.closed) return Promise.resolve({ done: true });
    return new Promise((resolve) => this.takers.push(resolve));
  }

  /** No further enqueues; waiting consumers finish once the buffer drains. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const taker of this.takers.splice(0)) taker({ done: true });
    // Blocked producers wake up and observe the closed queue.
    for (const putter of this.putters.splice(0)) putter();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const next = await this.dequeue();
      if (next.done) return;
      yield next.value;
    }
  }
}
