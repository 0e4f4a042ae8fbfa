// config/timing.ts - Centralized Timing Constants

// =============================================================================
// DURATION PARSING
// =============================================================================

export function parseDuration(value: string): number {
  const match = value.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/i);
  if (!match) throw new Error(`Invalid duration: ${value}`);
  const [, num, unit] = match;
  const n = parseFloat(num ?? '');
  switch ((unit ?? '').toLowerCase()) {
    case 'ms':
      return n;
    case 's':
      return n * 1000;
    case 'm':
      return n * 60_000;
    case 'h':
      return n * 3_600_000;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }
}

function getEnvDuration(key: string, defaultMs: number): number {
  const value = process.env[key];
  return value ? parseDuration(value) : defaultMs;
}

function getEnvInt(key: string, fallback: number): number {
  return parseInt(process.env[key] || String(fallback), 10);
}

// =============================================================================
// BASE TIMING CONSTANTS
// =============================================================================

export const TIMING = {
  // NETWORK -- every remote call carries its own timeout
  RESOLVE_TIMEOUT_MS: getEnvDuration('SKYCUT_RESOLVE_TIMEOUT', 10_000), // 10s
  CUTOUT_TIMEOUT_MS: getEnvDuration('SKYCUT_CUTOUT_TIMEOUT', 30_000), // 30s

  // RETRY & BACKOFF -- Constraint: base < max
  RETRY_BASE_DELAY_MS: getEnvDuration('SKYCUT_RETRY_BASE_DELAY', 500), // 0.5s
  RETRY_MAX_DELAY_MS: getEnvDuration('SKYCUT_RETRY_MAX_DELAY', 8_000), // 8s
  RESOLVE_MAX_RETRIES: getEnvInt('SKYCUT_RESOLVE_MAX_RETRIES', 2),
  CUTOUT_MAX_RETRIES: getEnvInt('SKYCUT_CUTOUT_MAX_RETRIES', 1),
} as const;

export type TimingConfig = typeof TIMING;
export type TimingKey = keyof TimingConfig;

// =============================================================================
// CONSTRAINT VALIDATION
// =============================================================================

export function validateTimingConstraints(timing: TimingConfig = TIMING): void {
  const errors: string[] = [];

  if (timing.RETRY_BASE_DELAY_MS >= timing.RETRY_MAX_DELAY_MS) {
    errors.push('Retry: base_delay must be < max_delay');
  }
  if (!Number.isInteger(timing.RESOLVE_MAX_RETRIES) || timing.RESOLVE_MAX_RETRIES < 0) {
    errors.push('Retry: resolve_max_retries must be a non-negative integer');
  }
  if (!Number.isInteger(timing.CUTOUT_MAX_RETRIES) || timing.CUTOUT_MAX_RETRIES < 0) {
    errors.push('Retry: cutout_max_retries must be a non-negative integer');
  }
  if (timing.RESOLVE_TIMEOUT_MS <= 0 || timing.CUTOUT_TIMEOUT_MS <= 0) {
    errors.push('Network: timeouts must be positive');
  }

  if (errors.length > 0) {
    throw new Error(`Timing constraint violations:\n${errors.join('\n')}`);
  }
}

// Validate at module load -- fail fast
validateTimingConstraints();

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Exponential backoff (factor 2) with ±10% jitter, capped at the max delay.
 * attempt 0 → ~base, attempt 1 → ~2×base, ...
 */
export function calculateBackoff(
  attempt: number,
  baseMs: number = TIMING.RETRY_BASE_DELAY_MS,
  maxMs: number = TIMING.RETRY_MAX_DELAY_MS,
): number {
  const delay = Math.min(baseMs * Math.pow(2, attempt), maxMs);
  const jitter = delay * 0.1 * (Math.random() * 2 - 1);
  return Math.round(delay + jitter);
}

/** Format milliseconds to human-readable string */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${ms / 1000}s`;
  if (ms < 3_600_000) return `${ms / 60_000}m`;
  return `${ms / 3_600_000}h`;
}
