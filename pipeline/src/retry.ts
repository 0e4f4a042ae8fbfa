// retry.ts - Sleep seam and bounded exponential-backoff retry loop

import { TIMING, calculateBackoff, isRetryable } from "@skycut/contracts";

// =============================================================================
// Sleep
// =============================================================================

let sleepImpl: (ms: number) => Promise<void> = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Replace the sleep implementation. Test-only. */
export function _setSleepForTest(fn: (ms: number) => Promise<void>): void {
  sleepImpl = fn;
}

/** Reset sleep to real implementation. Test-only. */
export function _resetSleep(): void {
  sleepImpl = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
}

export function sleep(ms: number): Promise<void> {
  return sleepImpl(ms);
}

// =============================================================================
// Retry
// =============================================================================

export interface RetryOptions {
  /** Additional attempts after the first one */
  maxRetries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Called before each backoff sleep with the 1-based retry number */
  onRetry?: (error: unknown, retry: number, delayMs: number) => void;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, or the retry
 * budget runs out. Only errors flagged retryable (see isRetryable) earn
 * another attempt; the last error is rethrown unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const baseDelayMs = options.baseDelayMs ?? TIMING.RETRY_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? TIMING.RETRY_MAX_DELAY_MS;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetryable(err) || attempt >= options.maxRetries) throw err;
      const delay = calculateBackoff(attempt, baseDelayMs, maxDelayMs);
      options.onRetry?.(err, attempt + 1, delay);
      await sleep(delay);
    }
  }
}
