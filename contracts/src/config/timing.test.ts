import { describe, test, expect, vi, afterEach } from 'vitest';
import {
  TIMING,
  parseDuration,
  validateTimingConstraints,
  calculateBackoff,
  formatDuration,
} from './timing';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseDuration', () => {
  test('accepts ms, s, m and h', () => {
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('1.5s')).toBe(1500);
    expect(parseDuration('2m')).toBe(120_000);
    expect(parseDuration('1h')).toBe(3_600_000);
  });

  test('rejects garbage', () => {
    expect(() => parseDuration('soon')).toThrow('Invalid duration: soon');
  });
});

describe('TIMING defaults', () => {
  test('match the documented values', () => {
    expect(TIMING.RESOLVE_MAX_RETRIES).toBe(2);
    expect(TIMING.CUTOUT_MAX_RETRIES).toBe(1);
    expect(TIMING.RETRY_BASE_DELAY_MS).toBe(500);
  });

  test('constraint check flags base >= max', () => {
    expect(() =>
      validateTimingConstraints({ ...TIMING, RETRY_BASE_DELAY_MS: 9_000, RETRY_MAX_DELAY_MS: 8_000 }),
    ).toThrow('Retry: base_delay must be < max_delay');
  });
});

describe('calculateBackoff', () => {
  test('doubles per attempt without jitter', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(calculateBackoff(0, 500, 8_000)).toBe(500);
    expect(calculateBackoff(1, 500, 8_000)).toBe(1_000);
    expect(calculateBackoff(2, 500, 8_000)).toBe(2_000);
  });

  test('caps at the max delay', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    expect(calculateBackoff(10, 500, 8_000)).toBe(8_000);
  });

  test('jitter stays within ±10%', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoff(1, 500, 8_000)).toBe(900);
    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(calculateBackoff(1, 500, 8_000)).toBe(1_100);
  });
});

describe('formatDuration', () => {
  test('picks the largest whole unit', () => {
    expect(formatDuration(500)).toBe('500ms');
    expect(formatDuration(30_000)).toBe('30s');
    expect(formatDuration(120_000)).toBe('2m');
  });
});
