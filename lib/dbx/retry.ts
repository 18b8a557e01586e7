/**
 * Exponential backoff for idempotent Databricks calls.
 *
 * Only reads are wrapped. Re-posting a question would start a second
 * conversation turn, so submissions go out exactly once.
 */

import { DatabricksApiError } from "@/lib/errors";
import { errorMessage, logger } from "@/lib/logger";

const PERMANENT_FAILURE_MARKERS = [
  "PERMISSION_DENIED",
  "INVALID_PARAMETER_VALUE",
  "RESOURCE_DOES_NOT_EXIST",
  "does not exist",
];

/**
 * Transient failures: 5xx, 429 and transport errors. Other 4xx responses
 * and errors carrying a permanent Databricks error code are final.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof DatabricksApiError) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  const message = errorMessage(error);
  return !PERMANENT_FAILURE_MARKERS.some((marker) => message.includes(marker));
}

export interface RetryOptions {
  /** Retries after the first attempt (default 2). */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Operation name for the log. */
  label?: string;
  sleep?: (ms: number) => Promise<void>;
}

const realSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Delay before retry `n` (1-based): initial, then doubling, capped. */
export function backoffDelay(n: number, initialDelayMs: number, maxDelayMs: number): number {
  return Math.min(initialDelayMs * 2 ** (n - 1), maxDelayMs);
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 2, initialDelayMs = 1_000, maxDelayMs = 8_000, label = "request", sleep = realSleep } = options;

  for (let retry = 0; ; retry++) {
    try {
      return await fn();
    } catch (err) {
      if (retry >= maxRetries || !isRetryableError(err)) throw err;

      const delayMs = backoffDelay(retry + 1, initialDelayMs, maxDelayMs);
      logger.warn("Retrying Databricks call", {
        operation: label,
        retry: retry + 1,
        maxRetries,
        delayMs,
        error: errorMessage(err),
      });
      await sleep(delayMs);
    }
  }
}
