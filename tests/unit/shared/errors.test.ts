/**
 * Unit Tests for Application Error Classes
 */

import { describe, test, expect } from '@jest/globals';
import {
  AppNotFoundError,
  AppValidationError,
  BaseAppError,
  InvalidFactorError,
  InvalidWeightsError,
  OutOfRangeMetricError,
  UnknownMetricFieldError,
  toAppError,
} from '../../../shared/errors';
import { failure, isFailure, isSuccess, success, unwrapResult } from '../../../shared/result-types';

const SCORING_ERROR_CASES: Array<[BaseAppError, string, string]> = [
  [new InvalidFactorError('leadership'), 'INVALID_FACTOR', "Unknown factor 'leadership'"],
  [InvalidWeightsError.badSum(99, 0.01), 'INVALID_WEIGHTS', 'Factor weights must sum to 100 (±0.01), got 99'],
  [new UnknownMetricFieldError('nonexistent_metric'), 'UNKNOWN_METRIC_FIELD', "Unknown metric field 'nonexistent_metric'"],
  [
    new OutOfRangeMetricError('certifications', -1, 'a finite number >= 0'),
    'OUT_OF_RANGE_METRIC',
    "Metric 'certifications' must be a finite number >= 0, got -1",
  ],
];

describe('Application Errors', () => {
  describe('scoring errors', () => {
    test.each(SCORING_ERROR_CASES)('should map %p to a 400 response', (error, code, message) => {
      expect(error).toBeInstanceOf(BaseAppError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
      expect(error.statusCode).toBe(400);
      expect(error.message).toBe(message);
    });

    test('should carry the offending factor in details', () => {
      expect(new InvalidFactorError('leadership').details).toEqual({ factor: 'leadership' });
    });

    test('should name the class', () => {
      expect(new UnknownMetricFieldError('x').name).toBe('UnknownMetricFieldError');
    });
  });

  describe('AppNotFoundError', () => {
    test('should build candidate not found errors', () => {
      const error = AppNotFoundError.candidate('nobody');
      expect(error.statusCode).toBe(404);
      expect(error.code).toBe('NOT_FOUND');
      expect(error.message).toBe("Candidate with ID 'nobody' not found");
    });
  });

  describe('toJSON', () => {
    test('should expose the response fields', () => {
      const error = new AppValidationError("Field 'metrics' is required", 'metrics', ['required']);
      expect(error.toJSON()).toEqual({
        code: 'VALIDATION_ERROR',
        message: "Field 'metrics' is required",
        statusCode: 400,
        details: undefined,
        timestamp: error.timestamp,
      });
    });
  });

  describe('toAppError', () => {
    test('should pass application errors through', () => {
      const error = new InvalidFactorError('leadership');
      expect(toAppError(error)).toBe(error);
    });

    test('should wrap unexpected errors as 500', () => {
      const converted = toAppError(new Error('boom'), 'scoring');
      expect(converted.statusCode).toBe(500);
      expect(converted.code).toBe('INTERNAL_ERROR');
      expect(converted.message).toBe('Unexpected error in scoring');
      expect(converted.details).toEqual({ originalError: 'boom' });
    });

    test('should convert malformed JSON bodies to validation errors', () => {
      const parseError = Object.assign(new SyntaxError('Unexpected token'), { status: 400 });
      const converted = toAppError(parseError);
      expect(converted).toBeInstanceOf(AppValidationError);
      expect(converted.message).toBe('Request body is not valid JSON');
    });

    test('should keep the 4xx status of an oversized body', () => {
      const tooLarge = Object.assign(new Error('request entity too large'), {
        status: 413,
        statusCode: 413,
        type: 'entity.too.large',
      });
      const converted = toAppError(tooLarge);
      expect(converted.statusCode).toBe(413);
      expect(converted.code).toBe('PAYLOAD_TOO_LARGE');
      expect(converted.message).toBe('request entity too large');
      expect(converted.details).toEqual({ type: 'entity.too.large' });
    });

    test('should read statusCode when status is absent', () => {
      const rejected = Object.assign(new Error('unsupported charset "UTF-7"'), { statusCode: 415 });
      const converted = toAppError(rejected);
      expect(converted.statusCode).toBe(415);
      expect(converted.code).toBe('UNSUPPORTED_MEDIA_TYPE');
      expect(converted.details).toBeUndefined();
    });

    test('should fall back to BAD_REQUEST for other 4xx statuses', () => {
      const converted = toAppError(Object.assign(new Error('request aborted'), { status: 400 }));
      expect(converted.statusCode).toBe(400);
      expect(converted.code).toBe('BAD_REQUEST');
    });

    test('should not trust a 5xx status on a foreign error', () => {
      const converted = toAppError(Object.assign(new Error('upstream'), { status: 503 }));
      expect(converted.statusCode).toBe(500);
      expect(converted.code).toBe('INTERNAL_ERROR');
    });

    test('should describe non-error values', () => {
      expect(toAppError('oops', 'loading').message).toBe('Unknown error in loading: oops');
    });
  });

  describe('Result helpers', () => {
    test('should unwrap a success', () => {
      expect(unwrapResult(success(42))).toBe(42);
    });

    test('should throw the carried error of a failure', () => {
      const error = new InvalidFactorError('leadership');
      expect(() => unwrapResult(failure(error))).toThrow(error);
    });

    test('should narrow results', () => {
      expect(isSuccess(success('ok'))).toBe(true);
      expect(isFailure(failure(new Error('no')))).toBe(true);
    });
  });
});
