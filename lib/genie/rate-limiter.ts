/**
 * Sliding-window rate limiter for Genie questions.
 *
 * At most `maxRequests` acquisitions fall inside any trailing `windowMs`.
 * Callers over the limit wait for the oldest timestamp to leave the window;
 * they are never rejected. Acquisitions are serialized so concurrent callers
 * queue in arrival order.
 */

import { logger } from "@/lib/logger";
import { systemClock, type Clock } from "./clock";
import { Mutex } from "./mutex";

export interface RateLimiterOptions {
  /** Default 5. */
  maxRequests?: number;
  /** Default 60 000. */
  windowMs?: number;
  clock?: Clock;
}

export class RateLimiter {
  readonly maxRequests: number;
  readonly windowMs: number;
  private readonly clock: Clock;
  private readonly timestamps: number[] = [];
  private readonly lock = new Mutex();

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? 5;
    this.windowMs = options.windowMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
    if (this.maxRequests < 1) throw new Error(`maxRequests must be >= 1, got ${this.maxRequests}`);
  }

  acquire(): Promise<void> {
    return this.lock.runExclusive(() => this.takeSlot());
  }

  private async takeSlot(): Promise<void> {
    this.evict(this.clock.now());

    if (this.timestamps.length >= this.maxRequests) {
      const waitMs = this.timestamps[0] + this.windowMs - this.clock.now();
      if (waitMs > 0) {
        logger.info("Genie rate limit reached, waiting", { waitMs });
        await this.clock.sleep(waitMs);
      }
      this.evict(this.clock.now());
    }

    this.timestamps.push(this.clock.now());
  }

  private evict(now: number): void {
    while (this.timestamps.length > 0 && this.timestamps[0] <= now - this.windowMs) {
      this.timestamps.shift();
    }
  }
}
