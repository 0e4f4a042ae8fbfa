// fetch/batch.ts - Bounded-concurrency batch fetch with index-aligned results
//
// N targets, min(workerCount, N) async workers. Each worker claims the next
// unclaimed index and writes that slot exactly once, so output[i] always
// belongs to input[i] whatever order the fetches finish in.

import {
  BATCH_MAX_PIXELS,
  BatchOptionsSchema,
  DEFAULT_WORKER_COUNT,
  assertSchema,
  type FetchResult,
  type TargetInput,
} from "@skycut/contracts";
import { rawTarget, toTarget, type LabeledTarget } from "../coords/targets";
import { consoleLogger, type Logger } from "../logger";
import { finish, type FallbackFetcher, type FetchOneOptions } from "./fallback";

export interface BatchOptions extends Omit<FetchOneOptions, "sizeCap"> {
  workerCount?: number;
  /** Stop claiming new targets once aborted; in-flight targets drain */
  signal?: AbortSignal;
  onProgress?: (done: number, total: number, result: FetchResult) => void;
}

export interface BatchExecutorOptions {
  workerCount?: number;
  logger?: Logger;
}

export class BatchExecutor {
  private readonly defaultWorkerCount: number;
  private readonly logger: Logger;

  constructor(
    private readonly fetcher: FallbackFetcher,
    options: BatchExecutorOptions = {},
  ) {
    this.defaultWorkerCount = options.workerCount ?? DEFAULT_WORKER_COUNT;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Fetch every target. Never rejects for a per-target failure; rejects only
   * for a bad call (invalid workerCount, options or survey), before any work.
   */
  async fetchMany(
    inputs: readonly TargetInput[],
    options: BatchOptions = {},
  ): Promise<FetchResult[]> {
    const { workerCount = this.defaultWorkerCount, signal, onProgress, ...fetchOptions } = options;
    assertSchema(BatchOptionsSchema, { ...fetchOptions, workerCount }, "batch options");
    // Thumbnails unless the caller pinned a size
    const perTarget: FetchOneOptions =
      fetchOptions.size === undefined ? { ...fetchOptions, sizeCap: BATCH_MAX_PIXELS } : fetchOptions;
    this.fetcher.checkOptions(perTarget);

    const total = inputs.length;
    const slots: (FetchResult | undefined)[] = new Array<FetchResult | undefined>(total).fill(undefined);
    const workers = Math.min(workerCount, total);
    let next = 0;
    let done = 0;

    this.logger.info(`[batch] ${total} target(s), ${workers} worker(s)`);

    const work = async (): Promise<void> => {
      while (next < total && !signal?.aborted) {
        const index = next++;
        const input = inputs[index];
        if (input === undefined) continue;
        const result = await this.fetcher.fetchOne(input, perTarget);
        slots[index] = result;
        done++;
        try {
          onProgress?.(done, total, result);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          this.logger.warn(`[batch] progress callback failed for ${result.label}: ${message}`);
        }
      }
    };

    await Promise.all(Array.from({ length: workers }, () => work()));

    const unclaimed = total - done;
    if (unclaimed > 0) {
      this.logger.warn(`[batch] cancelled with ${unclaimed} of ${total} target(s) not fetched`);
    }
    return slots.map((slot, index) => slot ?? cancelledResult(inputs[index]));
  }
}

function cancelledResult(input: TargetInput | undefined): FetchResult {
  const labeled = describe(input);
  return finish(labeled, {
    status: "exhausted",
    error: { code: "CANCELLED", message: `Batch cancelled before ${labeled.label} was fetched` },
  });
}

function describe(input: TargetInput | undefined): LabeledTarget {
  if (input === undefined) return { target: { kind: "name", name: "", raw: "" }, label: "" };
  try {
    return toTarget(input);
  } catch {
    return rawTarget(input);
  }
}
