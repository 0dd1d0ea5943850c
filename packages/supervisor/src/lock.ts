/**
 * AsyncLock — FIFO mutual exclusion for async critical sections.
 *
 * Each caller chains onto the tail of the previous holder, so sections run
 * one at a time in call order. A section that throws still releases.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True while any section is running or queued. */
  get isLocked(): boolean {
    return this.pending > 0;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => current);
    this.pending += 1;

    try {
      await previous;
      return await fn();
    } finally {
      this.pending -= 1;
      release();
    }
  }
}
