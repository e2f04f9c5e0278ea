import { describe, it, expect, vi } from "vitest";
import { retry, retryDelay, RetryAbortedError } from "../utils/retry.js";

describe("retryDelay", () => {
  it("keeps a fixed delay under the cap", () => {
    expect(retryDelay(1, { baseDelayMs: 500, maxDelayMs: 1000, backoff: "fixed" })).toBe(500);
    expect(retryDelay(4, { baseDelayMs: 5000, maxDelayMs: 1000, backoff: "fixed" })).toBe(1000);
  });

  it("grows exponentially and caps", () => {
    const opts = { baseDelayMs: 100, maxDelayMs: 1000, backoff: "exponential" as const };
    expect([1, 2, 3, 4, 5].map((attempt) => retryDelay(attempt, opts))).toEqual([100, 200, 400, 800, 1000]);
  });
});

describe("retry", () => {
  it("returns the first successful result", async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");
    const onRetry = vi.fn();

    await expect(retry(fn, { maxAttempts: 3, baseDelayMs: 0, onRetry })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(fn).toHaveBeenNthCalledWith(2, 2);
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it("rethrows the last error once the budget is spent", async () => {
    let calls = 0;
    const run = retry(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      { maxAttempts: 3, baseDelayMs: 0 }
    );
    await expect(run).rejects.toThrow("failure 3");
    expect(calls).toBe(3);
  });

  it("stops early when shouldRetry declines", async () => {
    let calls = 0;
    const run = retry(
      async () => {
        calls++;
        throw new Error("permanent");
      },
      { maxAttempts: 5, baseDelayMs: 0, shouldRetry: () => false }
    );
    await expect(run).rejects.toThrow("permanent");
    expect(calls).toBe(1);
  });

  it("rejects with RetryAbortedError when aborted between attempts", async () => {
    const controller = new AbortController();
    const run = retry(
      async () => {
        controller.abort("stop");
        throw new Error("busy");
      },
      { maxAttempts: 3, baseDelayMs: 10_000, signal: controller.signal }
    );
    const err = await run.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryAbortedError);
    expect(err instanceof RetryAbortedError && err.lastError instanceof Error && err.lastError.message).toBe("busy");
  });
});
