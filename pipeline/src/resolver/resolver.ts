// resolver/resolver.ts - Cache-aside name resolution with retry

import {
  NameResolutionError,
  TIMING,
  type ResolvedCoordinate,
} from "@skycut/contracts";
import { consoleLogger, type Logger } from "../logger";
import { withRetry } from "../retry";
import { ResolutionCache } from "./cache";
import type { NameService } from "./types";

export interface NameResolverOptions {
  cache?: ResolutionCache;
  /** Retries after the first lookup, for transient failures only */
  maxRetries?: number;
  baseDelayMs?: number;
  logger?: Logger;
}

export class NameResolver {
  readonly cache: ResolutionCache;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly service: NameService,
    options: NameResolverOptions = {},
  ) {
    this.cache = options.cache ?? new ResolutionCache();
    this.maxRetries = options.maxRetries ?? TIMING.RESOLVE_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? TIMING.RETRY_BASE_DELAY_MS;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Resolve a name to coordinates. Cache hit → no remote call. Only positive
   * answers are cached; "not found" and exhausted retries both throw
   * NameResolutionError.
   */
  async resolve(name: string): Promise<ResolvedCoordinate> {
    const cached = this.cache.get(name);
    if (cached !== undefined) return cached;

    let attempts = 0;
    let coord: ResolvedCoordinate | null;
    try {
      coord = await withRetry(
        () => {
          attempts++;
          return this.service.lookup(name);
        },
        {
          maxRetries: this.maxRetries,
          baseDelayMs: this.baseDelayMs,
          onRetry: (err, retry, delayMs) => {
            const message = err instanceof Error ? err.message : String(err);
            this.logger.warn(
              `[resolver] ${this.service.name} lookup for "${name}" failed (${message}); retry ${retry}/${this.maxRetries} in ${delayMs}ms`,
            );
          },
        },
      );
    } catch (err) {
      throw new NameResolutionError(name, "unavailable", { cause: err, attempts });
    }

    if (coord === null) {
      throw new NameResolutionError(name, "not_found");
    }
    this.cache.put(name, coord);
    return coord;
  }
}
