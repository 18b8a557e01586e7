/**
 * Fixed-interval long polling.
 *
 * The caller supplies `check`, which performs one remote status fetch.
 * The poller sleeps between checks (no backoff, no jitter) and gives up
 * with `GenieTimeoutError` once `timeoutMs` has elapsed.
 */

import { GenieTimeoutError } from "@/lib/errors";
import { systemClock, type Clock } from "./clock";

export type PollCheck<T> = () => Promise<{ done: true; value: T } | { done: false }>;

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  clock?: Clock;
}

export async function pollUntilComplete<T>(check: PollCheck<T>, options: PollOptions): Promise<T> {
  const { timeoutMs, intervalMs, clock = systemClock } = options;
  const startedAt = clock.now();

  for (;;) {
    const result = await check();
    if (result.done) return result.value;

    if (clock.now() - startedAt >= timeoutMs) {
      throw new GenieTimeoutError(
        `Operation timed out after ${timeoutMs / 1000} seconds. Consider increasing timeout_seconds.`,
        timeoutMs,
      );
    }
    await clock.sleep(intervalMs);
  }
}
