/**
 * Tests for the shared rate limiter
 */

import { performance } from "node:perf_hooks";
import { describe, it, expect } from "vitest";
import { RateLimiter, type Clock } from "../src/rate-limit.js";

/**
 * Clock whose sleeps advance time instantly and are recorded
 */
function fakeClock(start = 1000): Clock & { sleeps: number[] } {
  let now = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

describe("RateLimiter", () => {
  it("lets the first call through without waiting", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter(500, clock);
    await limiter.wait();
    expect(clock.sleeps).toEqual([]);
  });

  it("waits out the remaining interval before the next call", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter(500, clock);
    await limiter.wait();
    await limiter.wait();
    expect(clock.sleeps).toEqual([500]);
  });

  it("serializes overlapping callers", async () => {
    const clock = fakeClock();
    const limiter = new RateLimiter(200, clock);
    await Promise.all([limiter.wait(), limiter.wait(), limiter.wait()]);
    expect(clock.sleeps).toEqual([200, 200]);
  });

  it("does not wait once the interval has already passed", async () => {
    let now = 0;
    const sleeps: number[] = [];
    const clock: Clock = {
      now: () => now,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    };
    const limiter = new RateLimiter(100, clock);
    await limiter.wait();
    now = 150;
    await limiter.wait();
    expect(sleeps).toEqual([]);
  });

  it("spaces two back-to-back calls by at least the interval", async () => {
    const limiter = new RateLimiter(50);
    const started = performance.now();
    await limiter.wait();
    await limiter.wait();
    expect(performance.now() - started).toBeGreaterThanOrEqual(50);
  });
});
