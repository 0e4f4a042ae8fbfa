import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { ValidationError } from "@skycut/contracts";
import { CutoutClient } from "../../src/client";
import { silentLogger } from "../../src/logger";
import { _resetSleep, _setSleepForTest } from "../../src/retry";
import { MockCutoutService, MockNameService } from "../mock-services";

let names: MockNameService;
let cutouts: MockCutoutService;

beforeEach(() => {
  _setSleepForTest(async () => {});
  names = new MockNameService({ M31: [10.68, 41.27], M33: [23.46, 30.66] });
  cutouts = new MockCutoutService();
});

afterEach(() => {
  _resetSleep();
});

function makeClient(config: unknown = {}): CutoutClient {
  return new CutoutClient({ config, nameService: names, cutoutService: cutouts, logger: silentLogger });
}

describe("CutoutClient", () => {
  test("defaults", () => {
    expect(makeClient().config).toEqual({
      survey: "auto",
      fov: 1,
      workerCount: 8,
      cacheCapacity: 256,
      blankThreshold: 10,
    });
  });

  test("fetchOne end to end", async () => {
    cutouts.setOutcome("ls-dr10", "blank");
    const result = await makeClient().fetchOne("M31");
    expect(result.status).toBe("success");
    expect(result.surveyUsed).toBe("ls-dr9");
    expect(result.coordinate).toEqual({ ra: 10.68, dec: 41.27 });
  });

  test("fetchMany shares the resolution cache", async () => {
    const client = makeClient();
    const results = await client.fetchMany(["M31", "M33", "m31"], { workerCount: 1 });

    expect(results.map((r) => r.status)).toEqual(["success", "success", "success"]);
    expect(names.calls).toEqual(["M31", "M33"]);
    expect(client.cacheStats()).toEqual({ size: 2, capacity: 256, hits: 1, misses: 2, evictions: 0 });
  });

  test("resolve bypasses image fetching", async () => {
    const client = makeClient();
    await expect(client.resolve("M33")).resolves.toEqual({ ra: 23.46, dec: 30.66 });
    expect(cutouts.requests).toHaveLength(0);
  });

  test("configured default survey and fov apply", async () => {
    await makeClient({ survey: "sdss", fov: 2 }).fetchOne("M31");
    expect(cutouts.surveysRequested()).toEqual(["sdss"]);
    expect(cutouts.requests[0]?.size).toBe(303);
  });

  test("configured cache capacity applies", async () => {
    const client = makeClient({ cacheCapacity: 1 });
    await client.resolve("M31");
    await client.resolve("M33");
    await client.resolve("M31");
    expect(names.calls).toEqual(["M31", "M33", "M31"]);
    expect(client.cacheStats().evictions).toBe(2);
  });

  test("invalid config fails at construction", () => {
    expect(() => makeClient({ workerCount: 0 })).toThrow(ValidationError);
    expect(() => makeClient({ survey: "2mass" })).toThrow('Unknown survey "2mass"');
  });

  test("surveys lists the catalog", () => {
    expect(makeClient().surveys().map((s) => s.id)).toEqual([
      "ls-dr10",
      "ls-dr9",
      "panstarrs",
      "sdss",
      "des-dr1",
      "unwise-neo7",
      "galex",
    ]);
  });
});
