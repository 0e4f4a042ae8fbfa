// types.ts - Cross-cutting Primitives and Result Types

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Angle in decimal degrees */
export type Degrees = number;

/** Angle in arcminutes */
export type Arcminutes = number;

/** Survey identifier as it appears in the catalog (e.g. "ls-dr10") */
export type SurveyId = string;

/** "auto" selects the full fallback chain */
export type SurveySelection = SurveyId | 'auto';

// =============================================================================
// TARGETS
// =============================================================================

/**
 * A target after classification. `raw` is the caller's original token and is
 * what results report back, so output rows can be matched to input rows.
 */
export type Target =
  | { kind: 'name'; name: string; raw: string }
  | { kind: 'coordinate'; ra: Degrees; dec: Degrees; raw: string };

/** Accepted batch/fetch input forms before classification */
export type TargetInput =
  | string
  | readonly [number, number]
  | { ra: number; dec: number; label?: string }
  | { name: string; label?: string };

export interface ResolvedCoordinate {
  readonly ra: Degrees; // [0, 360)
  readonly dec: Degrees; // [-90, 90]
}

/** Build a frozen coordinate. Range checks belong to the caller. */
export function makeCoordinate(ra: Degrees, dec: Degrees): ResolvedCoordinate {
  return Object.freeze({ ra, dec });
}

export function isValidRa(ra: number): boolean {
  return Number.isFinite(ra) && ra >= 0 && ra < 360;
}

export function isValidDec(dec: number): boolean {
  return Number.isFinite(dec) && dec >= -90 && dec <= 90;
}

/** Display label for a coordinate pair, 4 decimal places */
export function formatCoordinate(coord: { ra: number; dec: number }): string {
  return `(${coord.ra.toFixed(4)}, ${coord.dec.toFixed(4)})`;
}

// =============================================================================
// IMAGES
// =============================================================================

/** Decoded 8-bit image, row-major, interleaved channels */
export interface PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly data: Uint8Array;
}

// =============================================================================
// FETCH RESULTS
// =============================================================================

export type FetchStatus =
  | 'success'
  | 'blank'
  | 'exhausted'
  | 'resolution_failed'
  | 'network_error';

/** Outcome of one survey attempt inside a fallback chain */
export type AttemptOutcome =
  | 'success'
  | 'blank'
  | 'not_covered'
  | 'network_error';

export interface SurveyAttempt {
  survey: SurveyId;
  outcome: AttemptOutcome;
  /** false when an explicitly requested survey's footprint excludes the target */
  covered: boolean;
  /** Standard deviation of the returned pixels, when an image came back */
  pixelStd?: number;
  message?: string;
}

export interface ErrorInfo {
  code: string;
  message: string;
}

/**
 * Per-target result. Created once by the fetcher and frozen; the batch
 * executor stores it in the slot matching the target's input position.
 */
export interface FetchResult {
  readonly target: Target;
  readonly label: string;
  readonly coordinate?: ResolvedCoordinate;
  readonly surveyUsed?: SurveyId;
  readonly image?: PixelBuffer;
  readonly status: FetchStatus;
  readonly attempts: readonly SurveyAttempt[];
  readonly error?: ErrorInfo;
}

export function isSuccess(result: FetchResult): boolean {
  return result.status === 'success';
}

/** Terminal statuses that carry no image */
export function isFailure(result: FetchResult): boolean {
  return result.status !== 'success';
}
