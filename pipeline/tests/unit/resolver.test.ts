import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { NameResolutionError } from "@skycut/contracts";
import { NameResolver } from "../../src/resolver/resolver";
import { ResolutionCache } from "../../src/resolver/cache";
import { silentLogger } from "../../src/logger";
import { _resetSleep, _setSleepForTest } from "../../src/retry";
import { MockNameService } from "../mock-services";

let sleeps: number[];

beforeEach(() => {
  sleeps = [];
  _setSleepForTest(async (ms) => {
    sleeps.push(ms);
  });
});

afterEach(() => {
  _resetSleep();
  vi.restoreAllMocks();
});

function makeResolver(service: MockNameService, capacity = 256): NameResolver {
  return new NameResolver(service, {
    cache: new ResolutionCache(capacity),
    maxRetries: 2,
    baseDelayMs: 500,
    logger: silentLogger,
  });
}

// =============================================================================
// Cache-aside
// =============================================================================

describe("cache-aside", () => {
  test("resolving the same name twice calls the backend once", async () => {
    const service = new MockNameService({ "NGC 788": [30.277, -6.816] });
    const resolver = makeResolver(service);

    const first = await resolver.resolve("NGC 788");
    const second = await resolver.resolve("ngc  788");

    expect(first).toEqual({ ra: 30.277, dec: -6.816 });
    expect(second).toBe(first);
    expect(service.calls).toEqual(["NGC 788"]);
  });

  test("not-found answers are not cached", async () => {
    const service = new MockNameService();
    const resolver = makeResolver(service);

    await expect(resolver.resolve("Nowhere 1")).rejects.toThrow(
      'Object "Nowhere 1" not found by name resolver',
    );
    await expect(resolver.resolve("Nowhere 1")).rejects.toBeInstanceOf(NameResolutionError);
    expect(service.calls).toEqual(["Nowhere 1", "Nowhere 1"]);
    expect(resolver.cache.size).toBe(0);
  });

  test("concurrent misses on one name may both reach the backend", async () => {
    const service = new MockNameService({ M31: [10.68, 41.27] }).setLatency("M31", 5);
    const resolver = makeResolver(service);

    const [a, b] = await Promise.all([resolver.resolve("M31"), resolver.resolve("M31")]);

    expect(a).toEqual(b);
    expect(service.calls).toHaveLength(2);
    expect(resolver.cache.size).toBe(1);
  });
});

// =============================================================================
// Retry
// =============================================================================

describe("retry", () => {
  test("two transient failures then success", async () => {
    const service = new MockNameService({ M31: [10.68, 41.27] }).failTransiently("M31", 2);
    const resolver = makeResolver(service);

    await expect(resolver.resolve("M31")).resolves.toEqual({ ra: 10.68, dec: 41.27 });
    expect(service.calls).toHaveLength(3);
  });

  test("backoff doubles from the base delay", async () => {
    vi.spyOn(Math, "random").mockReturnValue(0.5);
    const service = new MockNameService({ M31: [10.68, 41.27] }).failTransiently("M31", 2);
    await makeResolver(service).resolve("M31");
    expect(sleeps).toEqual([500, 1000]);
  });

  test("gives up after the initial call plus two retries", async () => {
    const service = new MockNameService({ M31: [10.68, 41.27] }).failTransiently("M31", 3);
    const resolver = makeResolver(service);

    await expect(resolver.resolve("M31")).rejects.toThrow(
      'Name resolver unavailable for "M31" after 3 attempt(s)',
    );
    expect(service.calls).toHaveLength(3);
    expect(resolver.cache.has("M31")).toBe(false);
  });

  test("non-retryable failures are not retried", async () => {
    const service = new MockNameService().failHard("M31");
    const resolver = makeResolver(service);

    await expect(resolver.resolve("M31")).rejects.toThrow(
      'Name resolver unavailable for "M31" after 1 attempt(s)',
    );
    expect(service.calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
  });

  test("retries are logged as warnings", async () => {
    const warnings: string[] = [];
    const service = new MockNameService({ M31: [10.68, 41.27] }).failTransiently("M31", 1);
    const resolver = new NameResolver(service, {
      maxRetries: 2,
      baseDelayMs: 500,
      logger: { info: () => {}, warn: (m) => warnings.push(m) },
    });
    vi.spyOn(Math, "random").mockReturnValue(0.5);

    await resolver.resolve("M31");

    expect(warnings).toEqual([
      '[resolver] mock-resolver lookup for "M31" failed (mock-resolver returned HTTP 503); retry 1/2 in 500ms',
    ]);
  });
});
