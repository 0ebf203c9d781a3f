import { describe, expect, it, vi } from "vitest";

import { isTransientError, retryAsync } from "../src/utils/retry-with-backoff.js";

describe("isTransientError", () => {
  it("recognises socket codes, fetch failures and 5xx statuses", () => {
    expect(isTransientError(Object.assign(new Error("reset"), { code: "ECONNRESET" }))).toBe(true);
    expect(isTransientError(new TypeError("fetch failed"))).toBe(true);
    expect(isTransientError(new Error("Download failed: 503 Service Unavailable"))).toBe(true);
    expect(isTransientError(new Error("Download failed: 404 Not Found"))).toBe(false);
  });
});

describe("retryAsync", () => {
  it("retries transient failures with doubling delays", async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("fetch failed"))
      .mockRejectedValueOnce(new Error("fetch failed"))
      .mockResolvedValue("ok");
    const delays: number[] = [];

    const result = await retryAsync(fn, 3, 1, (_attempt, delay) => delays.push(delay));

    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1, 2]);
  });

  it("does not retry a permanent failure", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("Download failed: 404 Not Found"));

    await expect(retryAsync(fn, 3, 1)).rejects.toThrow("404");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("gives up after maxRetries", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("fetch failed"));

    await expect(retryAsync(fn, 2, 1)).rejects.toThrow("fetch failed");
    expect(fn).toHaveBeenCalledTimes(3);
  });
});
