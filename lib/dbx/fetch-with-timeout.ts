/**
 * Per-request deadlines for Databricks REST calls.
 */

export class FetchTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(path: string, timeoutMs: number) {
    super(`Request to ${path} timed out after ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** `fetch` that gives up after `timeoutMs`, throwing `FetchTimeoutError`. */
export async function fetchWithTimeout(url: string, init: RequestInit, timeoutMs: number): Promise<Response> {
  try {
    return await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      throw new FetchTimeoutError(new URL(url).pathname, timeoutMs);
    }
    throw err;
  }
}

export const TIMEOUTS = {
  AUTH: 15_000,
  GENIE: 30_000,
  /** Statement results can run to thousands of rows */
  QUERY_RESULT: 60_000,
  CATALOG: 30_000,
  /** Generation replies regularly take minutes */
  MODEL_SERVING: 300_000,
} as const;
