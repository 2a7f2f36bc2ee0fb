/**
 * Minimum-interval rate limiting shared by all source clients
 */

import { performance } from "node:perf_hooks";

export const DEFAULT_MIN_INTERVAL_MS = 500;

/**
 * Time source, injectable for tests
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Spaces outbound calls at least `minIntervalMs` apart.
 *
 * Not a token bucket: each caller waits until the interval has passed since
 * the previous call was let through. Callers are queued on a promise chain,
 * so the last-call timestamp is read and written by one caller at a time
 * even when calls overlap.
 */
export class RateLimiter {
  private lastCallAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly minIntervalMs: number = DEFAULT_MIN_INTERVAL_MS,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Resolve once the caller may issue its request
   */
  wait(): Promise<void> {
    const turn = this.queue.then(() => this.acquire());
    // Later callers queue behind this turn whether or not it rejects
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  private async acquire(): Promise<void> {
    if (this.lastCallAt !== null) {
      let remaining = this.minIntervalMs - (this.clock.now() - this.lastCallAt);
      // Timers may fire a little early; keep waiting until the clock agrees
      while (remaining > 0) {
        await this.clock.sleep(remaining);
        remaining = this.minIntervalMs - (this.clock.now() - this.lastCallAt);
      }
    }
    this.lastCallAt = this.clock.now();
  }
}
