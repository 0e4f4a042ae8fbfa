// survey/types.ts - Survey descriptors and the cutout backend contract

import type {
  Degrees,
  PixelBuffer,
  ResolvedCoordinate,
  SurveyId,
} from "@skycut/contracts";

/** Which request builder a survey endpoint speaks */
export type EndpointKind = "legacy" | "panstarrs";

export interface SurveyEndpoint {
  readonly kind: EndpointKind;
  readonly baseUrl: string;
  /** Viewer layer name, for legacy-style endpoints */
  readonly layer?: string;
}

export interface SurveyDescriptor {
  readonly id: SurveyId;
  readonly description: string;
  readonly bands: ReadonlySet<string>;
  /** Higher is tried first */
  readonly priority: number;
  /** Inclusive declination footprint */
  readonly decRange: readonly [Degrees, Degrees];
  readonly endpoint: SurveyEndpoint;
  /** Arcsec per pixel */
  readonly defaultPixscale: number;
  readonly defaultSize: number;
  readonly maxSize: number;
  coverage(dec: Degrees): boolean;
}

/** Plain-data form a descriptor is built from */
export interface SurveyDefinition {
  id: SurveyId;
  description: string;
  bands: readonly string[];
  priority: number;
  decRange: readonly [Degrees, Degrees];
  endpoint: SurveyEndpoint;
  defaultPixscale: number;
  defaultSize?: number;
  maxSize: number;
}

export interface SurveyCandidate {
  survey: SurveyDescriptor;
  /** false only for an explicitly requested survey whose footprint misses the target */
  covered: boolean;
}

// =============================================================================
// Cutout backend
// =============================================================================

export interface CutoutRequest {
  survey: SurveyDescriptor;
  coordinate: ResolvedCoordinate;
  /** Output edge length in pixels */
  size: number;
  pixscale: number;
}

export type CutoutResponse =
  | { kind: "image"; image: PixelBuffer }
  | { kind: "not_covered"; reason: string };

/**
 * Per-survey image backend. Throws NetworkError on transport or HTTP
 * failure; a covered-but-empty answer is `not_covered`, not an error.
 */
export interface CutoutService {
  fetchCutout(request: CutoutRequest): Promise<CutoutResponse>;
}
