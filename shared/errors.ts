/**
 * Concrete error classes with status codes
 *
 * @fileoverview Every error the service raises extends BaseAppError so the
 * HTTP layer can answer with a consistent body. The scoring engine raises the
 * four caller-input errors below; none of them is transient and none is retried.
 *
 * @example
 * ```typescript
 * throw InvalidWeightsError.badSum(99);
 * throw new UnknownMetricFieldError('nonexistent_metric');
 *
 * console.log(error.code);        // 'INVALID_WEIGHTS'
 * console.log(error.statusCode);  // 400
 * ```
 */

import type {
  AppError,
  ValidationError,
  NotFoundError,
  ScoringError,
  ScoringErrorCode,
} from './result-types';

// ===== BASE ERROR CLASS =====

export class BaseAppError extends Error implements AppError {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object representation for API responses and logging
   */
  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp
    };
  }
}

// ===== VALIDATION ERRORS (400) =====

/**
 * Request or data-file content that does not match its schema
 */
export class AppValidationError extends BaseAppError implements ValidationError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly field?: string;
  readonly validationRules?: string[];

  constructor(
    message: string,
    field?: string,
    validationRules?: string[],
    details?: Record<string, unknown>
  ) {
    super('VALIDATION_ERROR', message, 400, details);
    this.field = field;
    this.validationRules = validationRules;
  }
}

// ===== SCORING ERRORS (400) =====

class BaseScoringError extends BaseAppError implements ScoringError {
  declare readonly code: ScoringErrorCode;
  readonly field?: string;

  constructor(
    code: ScoringErrorCode,
    message: string,
    field?: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, 400, details);
    this.field = field;
  }
}

/**
 * A factor name outside the five recognised keys
 */
export class InvalidFactorError extends BaseScoringError {
  readonly code = 'INVALID_FACTOR' as const;
  readonly factor: string;

  constructor(factor: string) {
    super('INVALID_FACTOR', `Unknown factor '${factor}'`, undefined, { factor });
    this.factor = factor;
  }
}

/**
 * Factor weights that are missing, malformed or do not sum to 100
 */
export class InvalidWeightsError extends BaseScoringError {
  readonly code = 'INVALID_WEIGHTS' as const;

  constructor(message: string, field?: string, details?: Record<string, unknown>) {
    super('INVALID_WEIGHTS', message, field, details);
  }

  static missing(factor: string): InvalidWeightsError {
    return new InvalidWeightsError(`Weight for factor '${factor}' is missing`, factor);
  }

  static unexpected(key: string): InvalidWeightsError {
    return new InvalidWeightsError(`'${key}' is not a recognised factor weight`, key);
  }

  static negative(factor: string, value: unknown): InvalidWeightsError {
    return new InvalidWeightsError(
      `Weight for factor '${factor}' must be a non-negative number, got ${String(value)}`,
      factor,
      { value: typeof value === 'number' ? value : String(value) }
    );
  }

  static badSum(sum: number, tolerance: number): InvalidWeightsError {
    return new InvalidWeightsError(
      `Factor weights must sum to 100 (±${tolerance}), got ${sum}`,
      undefined,
      { sum, tolerance }
    );
  }
}

/**
 * A metric key outside the recognised CandidateMetrics field set
 */
export class UnknownMetricFieldError extends BaseScoringError {
  readonly code = 'UNKNOWN_METRIC_FIELD' as const;

  constructor(field: string) {
    super('UNKNOWN_METRIC_FIELD', `Unknown metric field '${field}'`, field);
  }
}

/**
 * A metric (or score) that is missing, non-finite, negative or out of bounds
 */
export class OutOfRangeMetricError extends BaseScoringError {
  readonly code = 'OUT_OF_RANGE_METRIC' as const;

  constructor(field: string, value: unknown, expected: string) {
    super(
      'OUT_OF_RANGE_METRIC',
      `Metric '${field}' must be ${expected}, got ${String(value)}`,
      field,
      { value: typeof value === 'number' ? value : String(value), expected }
    );
  }
}

// ===== NOT FOUND (404) =====

export class AppNotFoundError extends BaseAppError implements NotFoundError {
  readonly code = 'NOT_FOUND' as const;
  readonly resource: string;
  readonly id?: string | number;

  constructor(resource: string, id?: string | number, details?: Record<string, unknown>) {
    const message = id
      ? `${resource} with ID '${id}' not found`
      : `${resource} not found`;
    super('NOT_FOUND', message, 404, details);
    this.resource = resource;
    this.id = id;
  }

  static candidate(id: string): AppNotFoundError {
    return new AppNotFoundError('Candidate', id);
  }

  static resourceNotFound(resource: string): AppNotFoundError {
    return new AppNotFoundError(resource);
  }
}

// ===== ERROR CONVERSION UTILITIES =====

const CLIENT_ERROR_CODES: Readonly<Record<number, string>> = {
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

/**
 * The 4xx status an http-errors style error carries (body-parser sets both
 * `status` and `statusCode`), if any
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status =
    'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  if (typeof status === 'number' && Number.isInteger(status) && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

/**
 * Converts unknown errors to typed BaseAppError instances
 *
 * @param context - Where the error occurred, kept in the details
 */
export function toAppError(error: unknown, context = 'Unknown operation'): BaseAppError {
  if (error instanceof BaseAppError) {
    return error;
  }

  // body-parser marks malformed JSON with a 4xx status
  if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    return new AppValidationError('Request body is not valid JSON', 'body', ['json']);
  }

  const status = clientErrorStatus(error);
  if (status !== undefined && error instanceof Error) {
    return new BaseAppError(
      CLIENT_ERROR_CODES[status] ?? 'BAD_REQUEST',
      error.message,
      status,
      'type' in error && typeof error.type === 'string' ? { type: error.type } : undefined
    );
  }

  if (error instanceof Error) {
    return new BaseAppError(
      'INTERNAL_ERROR',
      `Unexpected error in ${context}`,
      500,
      { originalError: error.message }
    );
  }

  return new BaseAppError(
    'INTERNAL_ERROR',
    `Unknown error in ${context}: ${String(error)}`,
    500
  );
}
