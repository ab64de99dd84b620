import { describe, expect, it, vi } from "vitest";
import { FetchError, ProviderHttpError, isTransientError } from "../src/domain/errors.js";
import { backoffDelay, RetryExhaustedError, withRetry } from "../src/utils/retry.js";

const noSleep = async () => {};

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(operation, { maxAttempts: 3, sleep: noSleep })).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it("gives up after maxAttempts with the last error", async () => {
    const operation = vi.fn(async () => {
      throw new Error("still down");
    });

    const error = await withRetry(operation, { maxAttempts: 3, sleep: noSleep }).catch(
      (caught: unknown) => caught,
    );
    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({ attempts: 3, message: "Failed after 3 attempts: still down" });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it("does not retry errors rejected by shouldRetry", async () => {
    const operation = vi.fn(async () => {
      throw new ProviderHttpError(400, "bad request");
    });

    await expect(
      withRetry(operation, { maxAttempts: 5, sleep: noSleep, shouldRetry: isTransientError }),
    ).rejects.toThrow("Failed after 1 attempt: bad request");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("waits with exponential backoff between attempts", async () => {
    const delays: number[] = [];
    const operation = vi.fn(async () => {
      throw new Error("down");
    });

    await withRetry(operation, {
      maxAttempts: 4,
      baseDelayMs: 100,
      maxDelayMs: 300,
      backoffMultiplier: 2,
      sleep: async (ms) => {
        delays.push(ms);
      },
    }).catch(() => undefined);

    expect(delays).toEqual([100, 200, 300]);
  });
});

describe("backoffDelay", () => {
  it("caps the delay at maxDelayMs", () => {
    const options = { baseDelayMs: 1000, maxDelayMs: 10_000, backoffMultiplier: 2 };
    expect([1, 2, 3, 4, 5].map((attempt) => backoffDelay(attempt, options))).toEqual([
      1000, 2000, 4000, 8000, 10_000,
    ]);
  });
});

describe("isTransientError", () => {
  it("retries timeouts, throttling and server errors only", () => {
    expect(isTransientError(new ProviderHttpError(429, "slow down"))).toBe(true);
    expect(isTransientError(new ProviderHttpError(503, "unavailable"))).toBe(true);
    expect(isTransientError(new ProviderHttpError(401, "unauthorized"))).toBe(false);
    expect(isTransientError(new FetchError("https://example.com/", "HTTP 404", 404))).toBe(false);
    expect(isTransientError(new FetchError("https://example.com/", "socket hang up"))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    expect(isTransientError("not an error")).toBe(false);
  });
});
