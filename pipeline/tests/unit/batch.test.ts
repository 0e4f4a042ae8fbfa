import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { ValidationError, type FetchResult } from "@skycut/contracts";
import { BatchExecutor } from "../../src/fetch/batch";
import { FallbackFetcher } from "../../src/fetch/fallback";
import { NameResolver } from "../../src/resolver/resolver";
import { defaultCatalog } from "../../src/survey/catalog";
import { silentLogger, type Logger } from "../../src/logger";
import { _resetSleep, _setSleepForTest } from "../../src/retry";
import { MockCutoutService, MockNameService } from "../mock-services";

let names: MockNameService;
let cutouts: MockCutoutService;

beforeEach(() => {
  _setSleepForTest(async () => {});
  names = new MockNameService({ A: [10, 10], B: [20, 20], C: [30, 30] });
  cutouts = new MockCutoutService();
});

afterEach(() => {
  _resetSleep();
});

function makeExecutor(workerCount?: number, logger: Logger = silentLogger): BatchExecutor {
  const fetcher = new FallbackFetcher({
    resolver: new NameResolver(names, { logger: silentLogger }),
    catalog: defaultCatalog,
    cutouts,
    logger: silentLogger,
  });
  return new BatchExecutor(fetcher, { workerCount, logger });
}

const labels = (results: FetchResult[]) => results.map((r) => r.label);

// =============================================================================
// Ordering
// =============================================================================

describe("ordering", () => {
  test("output follows input order even when C finishes first", async () => {
    names.setLatency("A", 30).setLatency("B", 15).setLatency("C", 0);
    const finished: string[] = [];

    const results = await makeExecutor(8).fetchMany(["A", "B", "C"], {
      onProgress: (_done, _total, result) => finished.push(result.label),
    });

    expect(finished).toEqual(["C", "B", "A"]);
    expect(labels(results)).toEqual(["A", "B", "C"]);
    expect(results.map((r) => r.coordinate?.ra)).toEqual([10, 20, 30]);
  });

  test("a single worker processes targets in input order", async () => {
    const finished: string[] = [];
    await makeExecutor(1).fetchMany(["A", "B", "C"], {
      onProgress: (_done, _total, result) => finished.push(result.label),
    });
    expect(finished).toEqual(["A", "B", "C"]);
  });

  test("progress counts up to the total", async () => {
    const seen: [number, number][] = [];
    await makeExecutor(2).fetchMany(["A", "B", "C"], {
      onProgress: (done, total) => seen.push([done, total]),
    });
    expect(seen).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  test("empty input returns an empty list", async () => {
    await expect(makeExecutor().fetchMany([])).resolves.toEqual([]);
  });
});

// =============================================================================
// Concurrency
// =============================================================================

describe("concurrency", () => {
  test("never runs more than workerCount fetches at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const service = new MockCutoutService();
    const original = service.fetchCutout.bind(service);
    service.fetchCutout = async (request) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return original(request);
    };
    cutouts = service;

    const targets = Array.from({ length: 10 }, (_, i): [number, number] => [i * 10, 0]);
    const results = await makeExecutor(3).fetchMany(targets);

    expect(results).toHaveLength(10);
    expect(peak).toBe(3);
  });
});

// =============================================================================
// Failure isolation
// =============================================================================

describe("failure isolation", () => {
  test("a throwing progress callback still yields every result", async () => {
    names.setLatency("B", 10).setLatency("C", 10);
    const warnings: string[] = [];
    const logger: Logger = { info: () => {}, warn: (message) => warnings.push(message) };

    const results = await makeExecutor(8, logger).fetchMany(["A", "B", "C"], {
      onProgress: () => {
        throw new Error("display closed");
      },
    });

    expect(labels(results)).toEqual(["A", "B", "C"]);
    expect(results.map((r) => r.status)).toEqual(["success", "success", "success"]);
    expect(cutouts.requests).toHaveLength(3);
    expect(warnings).toHaveLength(3);
    expect(warnings[0]).toBe("[batch] progress callback failed for A: display closed");
  });

  test("an unresolvable name does not stop the others", async () => {
    const results = await makeExecutor().fetchMany(["A", "Nowhere 1", "C"]);

    expect(results.map((r) => r.status)).toEqual(["success", "resolution_failed", "success"]);
    expect(results[1]?.label).toBe("Nowhere 1");
  });

  test("mixed input shapes, including a malformed one", async () => {
    const results = await makeExecutor().fetchMany([
      "150 2.2",
      [10.68, 41.27],
      { ra: 40, dec: -80, label: "south" },
      "999 0",
      { name: "B" },
    ]);

    expect(results.map((r) => r.status)).toEqual([
      "success",
      "success",
      "success",
      "resolution_failed",
      "success",
    ]);
    expect(labels(results)).toEqual(["(150.0000, 2.2000)", "(10.6800, 41.2700)", "south", "999 0", "B"]);
    expect(results[2]?.surveyUsed).toBe("unwise-neo7");
  });
});

// =============================================================================
// Options
// =============================================================================

describe("options", () => {
  test("thumbnails are capped at 512 px", async () => {
    await makeExecutor().fetchMany(["A"], { fov: 5 });
    expect(cutouts.requests[0]?.size).toBe(512);
  });

  test("an explicit size is not capped", async () => {
    await makeExecutor().fetchMany(["A"], { size: 800 });
    expect(cutouts.requests[0]?.size).toBe(800);
  });

  test("invalid workerCount fails before any work", async () => {
    await expect(makeExecutor().fetchMany(["A"], { workerCount: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(makeExecutor().fetchMany(["A"], { workerCount: 2.5 })).rejects.toBeInstanceOf(ValidationError);
    expect(names.calls).toHaveLength(0);
  });

  test("unknown survey fails before any work", async () => {
    await expect(makeExecutor().fetchMany(["A", "B"], { survey: "2mass" })).rejects.toThrow(
      'Unknown survey "2mass"',
    );
    expect(names.calls).toHaveLength(0);
  });
});

// =============================================================================
// Cancellation
// =============================================================================

describe("cancellation", () => {
  test("abort stops new claims; unclaimed slots are marked cancelled", async () => {
    const controller = new AbortController();
    const results = await makeExecutor(1).fetchMany(["A", "B", "C"], {
      signal: controller.signal,
      onProgress: (done) => {
        if (done === 1) controller.abort();
      },
    });

    expect(results).toHaveLength(3);
    expect(results[0]?.status).toBe("success");
    expect(results.slice(1).map((r) => [r.label, r.status, r.error?.code])).toEqual([
      ["B", "exhausted", "CANCELLED"],
      ["C", "exhausted", "CANCELLED"],
    ]);
    expect(names.calls).toEqual(["A"]);
  });

  test("already-aborted signal fetches nothing", async () => {
    const controller = new AbortController();
    controller.abort();
    const results = await makeExecutor().fetchMany(["A", "B"], { signal: controller.signal });
    expect(results.map((r) => r.error?.code)).toEqual(["CANCELLED", "CANCELLED"]);
    expect(cutouts.requests).toHaveLength(0);
  });
});
