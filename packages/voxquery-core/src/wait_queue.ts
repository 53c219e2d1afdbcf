// FIFO queue with timed waits.
//
// The receive loop pushes; callers of receive()/waitForEvent() shift. Once
// the queue is closed, buffered items can still be drained and every other
// wait fails with the close reason.

import { TimeoutError, type TimeoutOperation } from "./errors.ts";

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class WaitQueue<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closedWith: Error | null = null;

  constructor(private readonly operation: TimeoutOperation) {}

  /** Number of buffered items. */
  get size(): number {
    return this.buffer.length;
  }

  /** Number of callers currently waiting. */
  get pending(): number {
    return this.waiters.length;
  }

  isClosed(): boolean {
    return this.closedWith !== null;
  }

  /**
   * Deliver an item to the oldest waiter, or buffer it.
   *
   * Returns false if the queue is closed.
   */
  push(value: T): boolean {
    if (this.closedWith) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(value);
      return true;
    }

    this.buffer.push(value);
    return true;
  }

  /**
   * Take the oldest item, waiting up to `timeoutMs` (forever if undefined).
   *
   * Rejects with TimeoutError when the wait expires; a later shift() still
   * receives the next item.
   */
  shift(timeoutMs?: number): Promise<T> {
    if (this.buffer.length > 0) {
      const [head] = this.buffer.splice(0, 1);
      return Promise.resolve(head);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve, reject, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(new TimeoutError(this.operation, timeoutMs));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /** Close the queue and fail every current waiter with `reason`. Idempotent. */
  close(reason: Error): void {
    if (this.closedWith) return;
    this.closedWith = reason;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.reject(reason);
    }
  }
}
