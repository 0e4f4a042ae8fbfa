// errors.ts - Error Types and Factory Functions

import type { ErrorInfo } from './types';

// =============================================================================
// CATEGORIES & CODES
// =============================================================================

export type ErrorCategory =
  | 'validation'
  | 'not_found'
  | 'network'
  | 'coverage'
  | 'internal';

const ERROR_CATEGORIES: readonly ErrorCategory[] = [
  'validation',
  'not_found',
  'network',
  'coverage',
  'internal',
];

/** All error codes grouped by category for documentation/validation */
export const ERROR_CODES_BY_CATEGORY: Record<ErrorCategory, string[]> = {
  validation: ['INVALID_COORDINATE', 'INVALID_CONFIG', 'UNKNOWN_SURVEY'],
  not_found: ['NAME_NOT_RESOLVED'],
  network: ['NETWORK_ERROR', 'TIMEOUT_ERROR', 'RATE_LIMITED', 'HTTP_ERROR'],
  coverage: ['ALL_SURVEYS_EXHAUSTED', 'CANCELLED'],
  internal: ['INTERNAL_ERROR'],
};

/** Determine error category from an error code string */
export function categoryForCode(code: string): ErrorCategory {
  for (const category of ERROR_CATEGORIES) {
    if (ERROR_CODES_BY_CATEGORY[category].includes(code)) {
      return category;
    }
  }
  return 'internal';
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all skycut errors */
export class SkycutError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    options?: {
      retryable?: boolean;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'SkycutError';
    this.code = code;
    this.category = categoryForCode(code);
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/** Malformed numeric or sexagesimal coordinate input */
export class CoordinateParseError extends SkycutError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super('INVALID_COORDINATE', `Cannot parse coordinates "${input}": ${reason}`, {
      details: { input, reason },
    });
    this.name = 'CoordinateParseError';
    this.input = input;
  }
}

/** Name could not be resolved by the backend (no match, or retries exhausted) */
export class NameResolutionError extends SkycutError {
  readonly objectName: string;

  constructor(
    objectName: string,
    reason: 'not_found' | 'unavailable',
    options?: { cause?: unknown; attempts?: number },
  ) {
    super(
      'NAME_NOT_RESOLVED',
      reason === 'not_found'
        ? `Object "${objectName}" not found by name resolver`
        : `Name resolver unavailable for "${objectName}" after ${options?.attempts ?? 1} attempt(s)`,
      { details: { objectName, reason, attempts: options?.attempts }, cause: options?.cause },
    );
    this.name = 'NameResolutionError';
    this.objectName = objectName;
  }
}

/** Transport-level failure talking to a remote service */
export class NetworkError extends SkycutError {
  readonly service: string;
  readonly httpStatus?: number;

  constructor(
    service: string,
    message: string,
    options?: {
      code?: 'NETWORK_ERROR' | 'TIMEOUT_ERROR' | 'RATE_LIMITED' | 'HTTP_ERROR';
      retryable?: boolean;
      httpStatus?: number;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'NETWORK_ERROR', message, {
      retryable: options?.retryable ?? true,
      details: { service, httpStatus: options?.httpStatus },
      cause: options?.cause,
    });
    this.name = 'NetworkError';
    this.service = service;
    this.httpStatus = options?.httpStatus;
  }
}

/** Bad call: invalid options or unknown survey id. Fails before any work. */
export class ValidationError extends SkycutError {
  constructor(
    message: string,
    options?: {
      code?: 'INVALID_CONFIG' | 'UNKNOWN_SURVEY';
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(options?.code ?? 'INVALID_CONFIG', message, options);
    this.name = 'ValidationError';
  }
}

/** Every candidate survey was blank, uncovered or unreachable */
export class AllSurveysExhaustedError extends SkycutError {
  readonly surveys: string[];

  constructor(target: string, surveys: string[]) {
    super(
      'ALL_SURVEYS_EXHAUSTED',
      surveys.length === 0
        ? `No survey covers ${target}`
        : `No usable image for ${target} from ${surveys.join(', ')}`,
      { details: { target, surveys } },
    );
    this.name = 'AllSurveysExhaustedError';
    this.surveys = surveys;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isSkycutError(err: unknown): err is SkycutError {
  return err instanceof SkycutError;
}

/** Transient errors worth another attempt after backoff */
export function isRetryable(err: unknown): boolean {
  return isSkycutError(err) && err.retryable;
}

/** Flatten any thrown value into the `{ code, message }` stored on results */
export function toErrorInfo(err: unknown): ErrorInfo {
  if (isSkycutError(err)) {
    return { code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { code: 'INTERNAL_ERROR', message: err.message };
  }
  return { code: 'INTERNAL_ERROR', message: String(err) };
}
