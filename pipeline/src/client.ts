// client.ts - CutoutClient: the public entry point wiring every component

import {
  validateClientConfig,
  type FetchResult,
  type ResolvedClientConfig,
  type ResolvedCoordinate,
  type TargetInput,
} from "@skycut/contracts";
import { consoleLogger, type Logger } from "./logger";
import { ResolutionCache, type CacheStats } from "./resolver/cache";
import { NameResolver } from "./resolver/resolver";
import { SesameNameService } from "./resolver/sesame";
import type { NameService } from "./resolver/types";
import { BatchExecutor, type BatchOptions } from "./fetch/batch";
import { FallbackFetcher, type FetchOneOptions } from "./fetch/fallback";
import { SurveyCatalog, defaultCatalog } from "./survey/catalog";
import { HttpCutoutService } from "./survey/http";
import type { CutoutService, SurveyDescriptor } from "./survey/types";

export interface CutoutClientOptions {
  /** survey, fov, workerCount, cacheCapacity, blankThreshold */
  config?: unknown;
  nameService?: NameService;
  cutoutService?: CutoutService;
  catalog?: SurveyCatalog;
  /** Share one cache between clients; otherwise each client owns its own */
  cache?: ResolutionCache;
  logger?: Logger;
  /** Per-request retry backoff base, ms */
  retryBaseDelayMs?: number;
}

export class CutoutClient {
  readonly config: ResolvedClientConfig;
  private readonly catalog: SurveyCatalog;
  private readonly resolver: NameResolver;
  private readonly fetcher: FallbackFetcher;
  private readonly batch: BatchExecutor;

  /** Throws ValidationError for an invalid config or unknown default survey. */
  constructor(options: CutoutClientOptions = {}) {
    this.config = validateClientConfig(options.config ?? {});
    this.catalog = options.catalog ?? defaultCatalog;
    this.catalog.checkSelection(this.config.survey);

    const logger = options.logger ?? consoleLogger;
    const cache = options.cache ?? new ResolutionCache(this.config.cacheCapacity);
    this.resolver = new NameResolver(options.nameService ?? new SesameNameService(), {
      cache,
      baseDelayMs: options.retryBaseDelayMs,
      logger,
    });
    this.fetcher = new FallbackFetcher({
      resolver: this.resolver,
      catalog: this.catalog,
      cutouts: options.cutoutService ?? new HttpCutoutService(),
      defaultSurvey: this.config.survey,
      defaultFov: this.config.fov,
      blankThreshold: this.config.blankThreshold,
      baseDelayMs: options.retryBaseDelayMs,
      logger,
    });
    this.batch = new BatchExecutor(this.fetcher, {
      workerCount: this.config.workerCount,
      logger,
    });
  }

  fetchOne(target: TargetInput, options?: FetchOneOptions): Promise<FetchResult> {
    return this.fetcher.fetchOne(target, options);
  }

  fetchMany(targets: readonly TargetInput[], options?: BatchOptions): Promise<FetchResult[]> {
    return this.batch.fetchMany(targets, options);
  }

  /** Name → coordinate, bypassing any image fetch */
  resolve(name: string): Promise<ResolvedCoordinate> {
    return this.resolver.resolve(name);
  }

  surveys(): readonly SurveyDescriptor[] {
    return this.catalog.list();
  }

  cacheStats(): CacheStats {
    return this.resolver.cache.stats();
  }
}
