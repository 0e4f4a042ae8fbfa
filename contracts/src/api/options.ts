// api/options.ts - Client/Fetch/Batch Option Types + TypeBox Schemas

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ValidationError } from '../errors';
import type { Arcminutes, SurveySelection } from '../types';

// =============================================================================
// DEFAULTS
// =============================================================================

export const DEFAULT_FOV_ARCMIN = 1.0;
export const DEFAULT_WORKER_COUNT = 8;
export const DEFAULT_CACHE_CAPACITY = 256;
/** Pixel standard deviation below which a cutout counts as blank */
export const DEFAULT_BLANK_THRESHOLD = 10;
/** Thumbnail cap applied to batch fetches unless an explicit size is given */
export const BATCH_MAX_PIXELS = 512;

// =============================================================================
// TYPEBOX SCHEMAS
// =============================================================================

const SurveyField = Type.String({ minLength: 1 });
const FovField = Type.Number({ exclusiveMinimum: 0 });
const SizeField = Type.Integer({ minimum: 1 });
const WorkerCountField = Type.Integer({ minimum: 1 });

export const ClientConfigSchema = Type.Object({
  /** Catalog id, or "auto" for the full fallback chain */
  survey: Type.Optional(SurveyField),
  /** Field of view in arcminutes */
  fov: Type.Optional(FovField),
  workerCount: Type.Optional(WorkerCountField),
  cacheCapacity: Type.Optional(Type.Integer({ minimum: 1 })),
  blankThreshold: Type.Optional(Type.Number({ minimum: 0 })),
});
export type ClientConfig = Static<typeof ClientConfigSchema>;

export const FetchOptionsSchema = Type.Object({
  survey: Type.Optional(SurveyField),
  fov: Type.Optional(FovField),
  /** Cutout size in pixels; overrides the fov-derived size */
  size: Type.Optional(SizeField),
  /** Arcsec per pixel; overrides the survey default */
  pixscale: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
});
export type FetchOptionsInput = Static<typeof FetchOptionsSchema>;

export const BatchOptionsSchema = Type.Composite([
  FetchOptionsSchema,
  Type.Object({ workerCount: Type.Optional(WorkerCountField) }),
]);
export type BatchOptionsInput = Static<typeof BatchOptionsSchema>;

/** Client config with every default filled in */
export interface ResolvedClientConfig {
  survey: SurveySelection;
  fov: Arcminutes;
  workerCount: number;
  cacheCapacity: number;
  blankThreshold: number;
}

export const DEFAULT_CLIENT_CONFIG: ResolvedClientConfig = {
  survey: 'auto',
  fov: DEFAULT_FOV_ARCMIN,
  workerCount: DEFAULT_WORKER_COUNT,
  cacheCapacity: DEFAULT_CACHE_CAPACITY,
  blankThreshold: DEFAULT_BLANK_THRESHOLD,
};

// =============================================================================
// VALIDATION
// =============================================================================

export interface SchemaValidationError {
  path: string;
  message: string;
  value: unknown;
}

/**
 * Check `value` against `schema`, throwing a ValidationError that lists every
 * violation. Returns the value narrowed to the schema's static type.
 */
export function assertSchema<T extends TSchema>(
  schema: T,
  value: unknown,
  what: string,
): Static<T> {
  if (Value.Check(schema, value)) return value;
  const errors: SchemaValidationError[] = [...Value.Errors(schema, value)].map((e) => ({
    path: e.path,
    message: e.message,
    value: e.value,
  }));
  const summary = errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
  throw new ValidationError(`Invalid ${what}: ${summary}`, {
    code: 'INVALID_CONFIG',
    details: { errors },
  });
}

export function validateClientConfig(input: unknown = {}): ResolvedClientConfig {
  const config = assertSchema(ClientConfigSchema, input, 'client config');
  return {
    survey: config.survey ?? DEFAULT_CLIENT_CONFIG.survey,
    fov: config.fov ?? DEFAULT_CLIENT_CONFIG.fov,
    workerCount: config.workerCount ?? DEFAULT_CLIENT_CONFIG.workerCount,
    cacheCapacity: config.cacheCapacity ?? DEFAULT_CLIENT_CONFIG.cacheCapacity,
    blankThreshold: config.blankThreshold ?? DEFAULT_CLIENT_CONFIG.blankThreshold,
  };
}
