import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { NetworkError } from "@skycut/contracts";
import { _resetSleep, _setSleepForTest, withRetry } from "../../src/retry";

let sleeps: number[];

beforeEach(() => {
  sleeps = [];
  _setSleepForTest(async (ms) => {
    sleeps.push(ms);
  });
  vi.spyOn(Math, "random").mockReturnValue(0.5);
});

afterEach(() => {
  _resetSleep();
  vi.restoreAllMocks();
});

const transient = () => new NetworkError("svc", "svc returned HTTP 503", { httpStatus: 503 });

describe("withRetry", () => {
  test("returns the first success", async () => {
    const fn = vi.fn(async () => "ok");
    await expect(withRetry(fn, { maxRetries: 2 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  test("retries retryable errors with doubling delays", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw transient();
        return calls;
      },
      { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 1_000 },
    );
    expect(result).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  test("rethrows the last error when retries run out", async () => {
    const err = transient();
    await expect(
      withRetry(async () => {
        throw err;
      }, { maxRetries: 1, baseDelayMs: 100 }),
    ).rejects.toBe(err);
    expect(sleeps).toEqual([100]);
  });

  test("plain errors are not retried", async () => {
    const fn = vi.fn(async () => {
      throw new Error("bug");
    });
    await expect(withRetry(fn, { maxRetries: 3 })).rejects.toThrow("bug");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test("onRetry sees the retry number and delay", async () => {
    const seen: [number, number][] = [];
    let calls = 0;
    await withRetry(
      async () => {
        if (calls++ === 0) throw transient();
        return "ok";
      },
      { maxRetries: 1, baseDelayMs: 250, onRetry: (_err, retry, delayMs) => seen.push([retry, delayMs]) },
    );
    expect(seen).toEqual([[1, 250]]);
  });
});
