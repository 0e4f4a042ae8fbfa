// fetch/fallback.ts - Per-target survey fallback
//
// One target walks a linear state machine:
//
//   Resolving ──fail──▶ resolution_failed
//       │
//       ▼
//   TryingSurvey(i) ──non-blank image──▶ success
//       │ blank / not covered / network failure after retry
//       ▼
//   TryingSurvey(i+1) … ──no candidates left──▶ exhausted (or network_error)
//
// fetchOne only throws for a bad call (invalid options, unknown survey);
// every per-target failure lands in the returned FetchResult.

import {
  AllSurveysExhaustedError,
  DEFAULT_BLANK_THRESHOLD,
  DEFAULT_FOV_ARCMIN,
  FetchOptionsSchema,
  TIMING,
  assertSchema,
  makeCoordinate,
  toErrorInfo,
  type Arcminutes,
  type ErrorInfo,
  type FetchResult,
  type FetchStatus,
  type PixelBuffer,
  type ResolvedCoordinate,
  type SurveyAttempt,
  type SurveySelection,
  type Target,
  type TargetInput,
} from "@skycut/contracts";
import { rawTarget, toTarget, type LabeledTarget } from "../coords/targets";
import { consoleLogger, type Logger } from "../logger";
import type { NameResolver } from "../resolver/resolver";
import { withRetry } from "../retry";
import { isBlankStd, pixelStd } from "../survey/blank";
import type { SurveyCatalog } from "../survey/catalog";
import { cutoutSize } from "../survey/http";
import type { CutoutService, SurveyCandidate } from "../survey/types";

// =============================================================================
// Types
// =============================================================================

export interface FetchOneOptions {
  /** Catalog id or "auto" */
  survey?: SurveySelection;
  fov?: Arcminutes;
  /** Explicit edge length in pixels; wins over the fov-derived size */
  size?: number;
  /** Arcsec per pixel; defaults to each survey's native scale */
  pixscale?: number;
  /** Upper bound on the fov-derived size (batch thumbnails) */
  sizeCap?: number;
}

export interface FallbackFetcherOptions {
  resolver: NameResolver;
  catalog: SurveyCatalog;
  cutouts: CutoutService;
  defaultSurvey?: SurveySelection;
  defaultFov?: Arcminutes;
  blankThreshold?: number;
  /** Retries per survey for transient failures */
  maxRetries?: number;
  baseDelayMs?: number;
  logger?: Logger;
}

interface AttemptResult {
  attempt: SurveyAttempt;
  image?: PixelBuffer;
  error?: ErrorInfo;
}

// =============================================================================
// Fetcher
// =============================================================================

export class FallbackFetcher {
  readonly catalog: SurveyCatalog;
  readonly blankThreshold: number;
  private readonly resolver: NameResolver;
  private readonly cutouts: CutoutService;
  private readonly defaultSurvey: SurveySelection;
  private readonly defaultFov: number;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly logger: Logger;

  constructor(options: FallbackFetcherOptions) {
    this.resolver = options.resolver;
    this.catalog = options.catalog;
    this.cutouts = options.cutouts;
    this.defaultSurvey = options.defaultSurvey ?? "auto";
    this.defaultFov = options.defaultFov ?? DEFAULT_FOV_ARCMIN;
    this.blankThreshold = options.blankThreshold ?? DEFAULT_BLANK_THRESHOLD;
    this.maxRetries = options.maxRetries ?? TIMING.CUTOUT_MAX_RETRIES;
    this.baseDelayMs = options.baseDelayMs ?? TIMING.RETRY_BASE_DELAY_MS;
    this.logger = options.logger ?? consoleLogger;
  }

  /** Validate options up front so a bad call fails before any network work. */
  checkOptions(options: FetchOneOptions): void {
    assertSchema(FetchOptionsSchema, options, "fetch options");
    this.catalog.checkSelection(options.survey ?? this.defaultSurvey);
  }

  async fetchOne(input: TargetInput, options: FetchOneOptions = {}): Promise<FetchResult> {
    this.checkOptions(options);

    // Resolving
    let labeled: LabeledTarget;
    try {
      labeled = toTarget(input);
    } catch (err) {
      return finish(rawTarget(input), { status: "resolution_failed", error: toErrorInfo(err) });
    }

    let coordinate: ResolvedCoordinate;
    try {
      coordinate = await this.resolveTarget(labeled.target);
    } catch (err) {
      const error = toErrorInfo(err);
      this.logger.warn(`[fallback] cannot resolve ${labeled.label}: ${error.message}`);
      return finish(labeled, { status: "resolution_failed", error });
    }

    // TryingSurvey(i)
    const candidates = this.catalog.candidates(coordinate, options.survey ?? this.defaultSurvey);
    const attempts: SurveyAttempt[] = [];
    let lastError: ErrorInfo | undefined;

    for (const candidate of candidates) {
      const result = await this.trySurvey(labeled.label, coordinate, candidate, options);
      attempts.push(result.attempt);
      if (result.image) {
        return finish(labeled, {
          status: "success",
          coordinate,
          surveyUsed: candidate.survey.id,
          image: result.image,
          attempts,
        });
      }
      if (result.error) lastError = result.error;
    }

    // Exhausted
    const allNetwork = attempts.length > 0 && attempts.every((a) => a.outcome === "network_error");
    if (allNetwork && lastError) {
      return finish(labeled, { status: "network_error", coordinate, attempts, error: lastError });
    }
    const exhausted = new AllSurveysExhaustedError(
      labeled.label,
      attempts.map((a) => a.survey),
    );
    return finish(labeled, {
      status: "exhausted",
      coordinate,
      attempts,
      error: toErrorInfo(exhausted),
    });
  }

  private async resolveTarget(target: Target): Promise<ResolvedCoordinate> {
    if (target.kind === "coordinate") return makeCoordinate(target.ra, target.dec);
    return this.resolver.resolve(target.name);
  }

  private async trySurvey(
    label: string,
    coordinate: ResolvedCoordinate,
    candidate: SurveyCandidate,
    options: FetchOneOptions,
  ): Promise<AttemptResult> {
    const { survey, covered } = candidate;
    const pixscale = options.pixscale ?? survey.defaultPixscale;
    const maxSize = Math.min(survey.maxSize, options.sizeCap ?? survey.maxSize);
    const size =
      options.size !== undefined
        ? Math.min(options.size, survey.maxSize)
        : cutoutSize(options.fov ?? this.defaultFov, pixscale, maxSize);

    try {
      const response = await withRetry(
        () => this.cutouts.fetchCutout({ survey, coordinate, size, pixscale }),
        {
          maxRetries: this.maxRetries,
          baseDelayMs: this.baseDelayMs,
          onRetry: (err, retry, delayMs) => {
            const message = err instanceof Error ? err.message : String(err);
            this.logger.warn(
              `[fallback] ${survey.id} failed for ${label} (${message}); retry ${retry}/${this.maxRetries} in ${delayMs}ms`,
            );
          },
        },
      );

      if (response.kind === "not_covered") {
        return { attempt: { survey: survey.id, outcome: "not_covered", covered, message: response.reason } };
      }

      const std = pixelStd(response.image);
      if (isBlankStd(std, this.blankThreshold)) {
        return { attempt: { survey: survey.id, outcome: "blank", covered, pixelStd: std } };
      }
      return {
        attempt: { survey: survey.id, outcome: "success", covered, pixelStd: std },
        image: response.image,
      };
    } catch (err) {
      const error = toErrorInfo(err);
      this.logger.warn(`[fallback] ${survey.id} unavailable for ${label}: ${error.message}; trying next survey`);
      return {
        attempt: { survey: survey.id, outcome: "network_error", covered, message: error.message },
        error,
      };
    }
  }
}

// =============================================================================
// Result construction
// =============================================================================

interface ResultFields {
  status: FetchStatus;
  coordinate?: ResolvedCoordinate;
  surveyUsed?: string;
  image?: PixelBuffer;
  attempts?: SurveyAttempt[];
  error?: ErrorInfo;
}

/** Build the frozen per-target result. */
export function finish(labeled: LabeledTarget, fields: ResultFields): FetchResult {
  const attempts = Object.freeze((fields.attempts ?? []).map((a) => Object.freeze({ ...a })));
  return Object.freeze({
    target: labeled.target,
    label: labeled.label,
    status: fields.status,
    attempts,
    ...(fields.coordinate ? { coordinate: fields.coordinate } : {}),
    ...(fields.surveyUsed ? { surveyUsed: fields.surveyUsed } : {}),
    ...(fields.image ? { image: fields.image } : {}),
    ...(fields.error ? { error: fields.error } : {}),
  });
}
