import { describe, test, expect } from "vitest";
import { HttpStatusError, backoffDelay, isRetryableError, withRetry } from "./retry";

const noWait = async (): Promise<void> => {};

describe("backoffDelay", () => {
  test("doubles the base delay per attempt", () => {
    const policy = { baseDelayMs: 100, jitterMs: 0 };
    expect(backoffDelay(0, policy)).toBe(100);
    expect(backoffDelay(1, policy)).toBe(200);
    expect(backoffDelay(3, policy)).toBe(800);
  });

  test("applies jitter in both directions", () => {
    const policy = { baseDelayMs: 100, jitterMs: 50 };
    expect(backoffDelay(0, policy, () => 0)).toBe(50);
    expect(backoffDelay(0, policy, () => 1)).toBe(150);
  });

  test("never returns a negative delay", () => {
    expect(backoffDelay(0, { baseDelayMs: 10, jitterMs: 100 }, () => 0)).toBe(0);
  });
});

describe("isRetryableError", () => {
  test("retries listed HTTP statuses", () => {
    expect(isRetryableError(new HttpStatusError(429, "u"))).toBe(true);
    expect(isRetryableError(new HttpStatusError(503, "u"))).toBe(true);
  });

  test("does not retry other HTTP statuses", () => {
    expect(isRetryableError(new HttpStatusError(404, "u"))).toBe(false);
  });

  test("retries transport errors", () => {
    expect(isRetryableError(new TypeError("fetch failed"))).toBe(true);
  });

  test("honours a custom status list", () => {
    expect(isRetryableError(new HttpStatusError(404, "u"), { retryOnStatus: [404] })).toBe(true);
  });
});

describe("withRetry", () => {
  test("returns the first successful result", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error("flaky");
        return "ok";
      },
      { retries: 2 },
      noWait
    );

    expect(result).toBe("ok");
    expect(calls).toBe(3);
  });

  test("rethrows after the last retry", async () => {
    let calls = 0;
    const attempt = withRetry(
      async () => {
        calls++;
        throw new Error("down");
      },
      { retries: 1 },
      noWait
    );

    await expect(attempt).rejects.toThrow("down");
    expect(calls).toBe(2);
  });

  test("does not retry non-retryable errors", async () => {
    let calls = 0;
    const attempt = withRetry(
      async () => {
        calls++;
        throw new HttpStatusError(404, "https://example.test/anime/1");
      },
      { retries: 3 },
      noWait
    );

    await expect(attempt).rejects.toThrow("HTTP 404 from https://example.test/anime/1");
    expect(calls).toBe(1);
  });

  test("waits between attempts", async () => {
    const waits: number[] = [];
    await expect(
      withRetry(
        async () => {
          throw new Error("down");
        },
        { retries: 2, baseDelayMs: 10, jitterMs: 0 },
        async (ms) => {
          waits.push(ms);
        }
      )
    ).rejects.toThrow("down");

    expect(waits).toEqual([10, 20]);
  });
});
