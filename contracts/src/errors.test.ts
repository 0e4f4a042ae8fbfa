import { describe, test, expect } from 'vitest';
import {
  SkycutError,
  CoordinateParseError,
  NameResolutionError,
  NetworkError,
  ValidationError,
  AllSurveysExhaustedError,
  categoryForCode,
  isRetryable,
  toErrorInfo,
} from './errors';

describe('categoryForCode', () => {
  test('maps known codes to their category', () => {
    expect(categoryForCode('INVALID_COORDINATE')).toBe('validation');
    expect(categoryForCode('NAME_NOT_RESOLVED')).toBe('not_found');
    expect(categoryForCode('RATE_LIMITED')).toBe('network');
    expect(categoryForCode('CANCELLED')).toBe('coverage');
  });

  test('unknown codes fall back to internal', () => {
    expect(categoryForCode('SOMETHING_ELSE')).toBe('internal');
  });
});

describe('error classes', () => {
  test('CoordinateParseError carries input and code', () => {
    const err = new CoordinateParseError('400 10', 'RA 400 outside [0, 360)');
    expect(err).toBeInstanceOf(SkycutError);
    expect(err.name).toBe('CoordinateParseError');
    expect(err.code).toBe('INVALID_COORDINATE');
    expect(err.category).toBe('validation');
    expect(err.input).toBe('400 10');
    expect(err.message).toBe('Cannot parse coordinates "400 10": RA 400 outside [0, 360)');
  });

  test('NameResolutionError messages distinguish not found from unavailable', () => {
    expect(new NameResolutionError('M31', 'not_found').message).toBe(
      'Object "M31" not found by name resolver',
    );
    expect(new NameResolutionError('M31', 'unavailable', { attempts: 3 }).message).toBe(
      'Name resolver unavailable for "M31" after 3 attempt(s)',
    );
  });

  test('NetworkError is retryable unless told otherwise', () => {
    const transient = new NetworkError('sesame', 'connection reset');
    const fatal = new NetworkError('sesame', 'HTTP 400', { code: 'HTTP_ERROR', retryable: false, httpStatus: 400 });
    expect(isRetryable(transient)).toBe(true);
    expect(isRetryable(fatal)).toBe(false);
    expect(fatal.httpStatus).toBe(400);
    expect(fatal.category).toBe('network');
  });

  test('ValidationError defaults to INVALID_CONFIG', () => {
    expect(new ValidationError('bad').code).toBe('INVALID_CONFIG');
    expect(new ValidationError('bad', { code: 'UNKNOWN_SURVEY' }).code).toBe('UNKNOWN_SURVEY');
  });

  test('AllSurveysExhaustedError lists the surveys tried', () => {
    expect(new AllSurveysExhaustedError('M31', ['ls-dr10', 'galex']).message).toBe(
      'No usable image for M31 from ls-dr10, galex',
    );
    expect(new AllSurveysExhaustedError('M31', []).message).toBe('No survey covers M31');
  });
});

describe('toErrorInfo', () => {
  test('keeps skycut codes and wraps everything else as internal', () => {
    expect(toErrorInfo(new ValidationError('bad size'))).toEqual({
      code: 'INVALID_CONFIG',
      message: 'bad size',
    });
    expect(toErrorInfo(new Error('boom'))).toEqual({ code: 'INTERNAL_ERROR', message: 'boom' });
    expect(toErrorInfo('plain')).toEqual({ code: 'INTERNAL_ERROR', message: 'plain' });
  });

  test('non-skycut errors are never retryable', () => {
    expect(isRetryable(new Error('boom'))).toBe(false);
  });
});
