import { describe, it, expect, vi } from "vitest";
import { DatabricksApiError } from "@/lib/errors";
import { backoffDelay, isRetryableError, withRetry } from "@/lib/dbx/retry";

describe("isRetryableError", () => {
  it("retries server errors and throttling only", () => {
    expect(isRetryableError(new DatabricksApiError("Get", 503, ""))).toBe(true);
    expect(isRetryableError(new DatabricksApiError("Get", 429, ""))).toBe(true);
    expect(isRetryableError(new DatabricksApiError("Get", 400, ""))).toBe(false);
    expect(isRetryableError(new DatabricksApiError("Get", 404, ""))).toBe(false);
  });

  it("treats permanent error codes in transport errors as final", () => {
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
    expect(isRetryableError(new Error("PERMISSION_DENIED: no access"))).toBe(false);
  });
});

describe("backoffDelay", () => {
  it("doubles up to the cap", () => {
    expect([1, 2, 3, 4, 5].map((n) => backoffDelay(n, 1_000, 8_000))).toEqual([1_000, 2_000, 4_000, 8_000, 8_000]);
  });
});

describe("withRetry", () => {
  it("rethrows the last error once the retries are spent", async () => {
    const delays: number[] = [];
    let attempt = 0;
    const fn = vi.fn(async () => {
      attempt += 1;
      throw new DatabricksApiError("Get", 500, `attempt ${attempt}`);
    });

    const sleep = async (ms: number) => {
      delays.push(ms);
    };
    await expect(withRetry(fn, { maxRetries: 2, sleep })).rejects.toThrow("Get failed (500): attempt 3");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1_000, 2_000]);
  });

  it("returns as soon as a call succeeds", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValueOnce(new Error("reset")).mockResolvedValueOnce("ok");
    expect(await withRetry(fn, { sleep: async () => {} })).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
