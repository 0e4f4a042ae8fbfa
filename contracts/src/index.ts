// index.ts - Re-exports from all modules

// Types & primitives
export type {
  Degrees,
  Arcminutes,
  SurveyId,
  SurveySelection,
  Target,
  TargetInput,
  ResolvedCoordinate,
  PixelBuffer,
  FetchStatus,
  AttemptOutcome,
  SurveyAttempt,
  ErrorInfo,
  FetchResult,
} from './types';

export {
  makeCoordinate,
  isValidRa,
  isValidDec,
  formatCoordinate,
  isSuccess,
  isFailure,
} from './types';

// Errors
export {
  SkycutError,
  CoordinateParseError,
  NameResolutionError,
  NetworkError,
  ValidationError,
  AllSurveysExhaustedError,
  ERROR_CODES_BY_CATEGORY,
  categoryForCode,
  isSkycutError,
  isRetryable,
  toErrorInfo,
} from './errors';

export type { ErrorCategory } from './errors';

// API - Options
export {
  ClientConfigSchema,
  FetchOptionsSchema,
  BatchOptionsSchema,
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_FOV_ARCMIN,
  DEFAULT_WORKER_COUNT,
  DEFAULT_CACHE_CAPACITY,
  DEFAULT_BLANK_THRESHOLD,
  BATCH_MAX_PIXELS,
  assertSchema,
  validateClientConfig,
} from './api/options';

export type {
  ClientConfig,
  FetchOptionsInput,
  BatchOptionsInput,
  ResolvedClientConfig,
  SchemaValidationError,
} from './api/options';

// Config - Timing
export {
  TIMING,
  parseDuration,
  validateTimingConstraints,
  calculateBackoff,
  formatDuration,
} from './config/timing';

export type { TimingConfig, TimingKey } from './config/timing';
