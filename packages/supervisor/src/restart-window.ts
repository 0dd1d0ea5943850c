/**
 * Sliding-window restart counter.
 *
 * Holds the timestamps of recent automatic restarts and admits a new one
 * only while fewer than `limit` fall inside the trailing window.
 */

export const RESTART_WINDOW_MS = 60_000;

export class RestartWindow {
  private timestamps: number[] = [];

  constructor(
    readonly limit: number,
    readonly windowMs: number = RESTART_WINDOW_MS,
  ) {}

  /** Drop timestamps that have aged out of the window as of `now`. */
  prune(now: number): void {
    this.timestamps = this.timestamps.filter((ts) => now - ts < this.windowMs);
  }

  /**
   * Record a restart at `now` if the window has room.
   * Returns false (and records nothing) when the limit is reached.
   */
  tryRecord(now: number): boolean {
    this.prune(now);
    if (this.timestamps.length >= this.limit) return false;
    this.timestamps.push(now);
    return true;
  }

  /** Restarts currently counted, as of the last prune. */
  get count(): number {
    return this.timestamps.length;
  }

  snapshot(): readonly number[] {
    return [...this.timestamps];
  }
}
