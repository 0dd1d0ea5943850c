/**
 * EventBus — ordered, unbounded FIFO of ServerEvents.
 *
 * Any number of producers publish synchronously and never wait. One logical
 * consumer reads with next() / drain() / async iteration; fan-out to several
 * destinations is the consumer's job.
 *
 * The queue is deliberately uncapped: with no consumer attached, memory
 * grows with every published event.
 */

import type { ServerEvent } from '@hostwarden/core';

interface Waiter {
  resolve: (event: ServerEvent) => void;
  reject: (err: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class EventBus {
  private queue: ServerEvent[] = [];
  private readonly waiters: Waiter[] = [];

  /** Events currently buffered (not yet taken by a consumer). */
  get length(): number {
    return this.queue.length;
  }

  publish(event: ServerEvent): void {
    // A parked consumer means the queue is empty, so handing over directly
    // keeps emission order.
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      waiter.resolve(event);
      return;
    }
    this.queue.push(event);
  }

  /** Take the oldest buffered event without waiting. */
  tryNext(): ServerEvent | undefined {
    return this.queue.shift();
  }

  /**
   * Take the oldest event, waiting for one to be published if the queue is
   * empty. Rejects if `signal` aborts first.
   */
  next(signal?: AbortSignal): Promise<ServerEvent> {
    const buffered = this.queue.shift();
    if (buffered) return Promise.resolve(buffered);

    if (signal?.aborted) {
      return Promise.reject(new Error('EventBus read aborted'));
    }

    return new Promise<ServerEvent>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          reject(new Error('EventBus read aborted'));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /** Remove and return everything buffered, oldest first. */
  drain(): ServerEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }

  /** Iterate forever, yielding events as they arrive. */
  async *[Symbol.asyncIterator](): AsyncGenerator<ServerEvent, void, undefined> {
    while (true) {
      yield await this.next();
    }
  }
}
