// index.ts - Re-exports from all modules

export { CutoutClient } from "./client";
export type { CutoutClientOptions } from "./client";

// Targets
export { parseTarget } from "./coords/parse";
export { toTarget, rawTarget, describeInput, coerceTargets } from "./coords/targets";
export type { LabeledTarget } from "./coords/targets";

// Resolution
export { ResolutionCache, normalizeName } from "./resolver/cache";
export type { CacheStats } from "./resolver/cache";
export { NameResolver } from "./resolver/resolver";
export type { NameResolverOptions } from "./resolver/resolver";
export { SesameNameService, SESAME_DEFAULT_URL, parseSesameXml } from "./resolver/sesame";
export type { SesameOptions } from "./resolver/sesame";
export type { NameService } from "./resolver/types";

// Surveys
export {
  SurveyCatalog,
  DEFAULT_SURVEYS,
  DEFAULT_CUTOUT_SIZE,
  buildDescriptor,
  defaultCatalog,
} from "./survey/catalog";
export { HttpCutoutService, buildCutoutUrl, cutoutSize, decodeJpeg } from "./survey/http";
export type { HttpCutoutOptions } from "./survey/http";
export { pixelStd, isBlank, isBlankStd } from "./survey/blank";
export type {
  EndpointKind,
  SurveyEndpoint,
  SurveyDescriptor,
  SurveyDefinition,
  SurveyCandidate,
  CutoutRequest,
  CutoutResponse,
  CutoutService,
} from "./survey/types";

// Fetching
export { FallbackFetcher } from "./fetch/fallback";
export type { FetchOneOptions, FallbackFetcherOptions } from "./fetch/fallback";
export { BatchExecutor } from "./fetch/batch";
export type { BatchOptions, BatchExecutorOptions } from "./fetch/batch";

// Plumbing
export { consoleLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";
export { sleep, withRetry, _setSleepForTest, _resetSleep } from "./retry";
export type { RetryOptions } from "./retry";
export { mapHttpStatus, mapTransportError } from "./net";
