import { describe, it, expect } from "vitest";
import { RateLimiter } from "@/lib/genie/rate-limiter";
import type { Clock } from "@/lib/genie/clock";

function manualClock(start = 0): Clock & { sleeps: number[] } {
  let t = start;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => t,
    sleep: async (ms) => {
      sleeps.push(ms);
      t += ms;
    },
  };
}

describe("RateLimiter", () => {
  it("holds the third request until the window frees a slot", async () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 10_000, clock });

    const completed: number[] = [];
    for (let i = 0; i < 3; i++) {
      await limiter.acquire();
      completed.push(clock.now());
    }

    expect(completed).toEqual([0, 0, 10_000]);
    expect(completed[2] - completed[0]).toBeGreaterThanOrEqual(10_000);
    expect(clock.sleeps).toEqual([10_000]);
  });

  it("queues concurrent callers in arrival order", async () => {
    const clock = manualClock();
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1_000, clock });

    const order: number[] = [];
    await Promise.all(
      [1, 2, 3].map((n) =>
        limiter.acquire().then(() => {
          order.push(n);
        }),
      ),
    );

    expect(order).toEqual([1, 2, 3]);
    expect(clock.now()).toBe(2_000);
  });

  it("does not wait once old requests leave the window", async () => {
    const clock = manualClock(5_000);
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 10_000, clock });
    await limiter.acquire();
    await limiter.acquire();

    await clock.sleep(10_000);
    await limiter.acquire();
    expect(clock.sleeps).toEqual([10_000]);
  });

  it("defaults to five requests per minute", () => {
    const limiter = new RateLimiter();
    expect(limiter.maxRequests).toBe(5);
    expect(limiter.windowMs).toBe(60_000);
  });

  it("rejects a limit below one", () => {
    expect(() => new RateLimiter({ maxRequests: 0 })).toThrow("maxRequests must be >= 1, got 0");
  });
});
