/**
 * Result pattern for validation and boundary checks
 *
 * @fileoverview Validators return a Result instead of throwing so callers can
 * collect or transform failures; the scoring operations unwrap them and throw
 * the carried error, which keeps every public operation a plain function.
 *
 * @example
 * ```typescript
 * const checked = validateFactorWeights(input);
 * if (isFailure(checked)) {
 *   logger.warn({ code: checked.error.code }, checked.error.message);
 * } else {
 *   useWeights(checked.data);
 * }
 * ```
 */

// ===== CORE RESULT TYPES =====

export type Result<T, E = AppError> = Success<T> | Failure<E>;

export interface Success<T> {
  readonly success: true;
  readonly data: T;
}

export interface Failure<E> {
  readonly success: false;
  readonly error: E;
}

export const success = <T>(data: T): Success<T> => ({ success: true, data });

export const failure = <E>(error: E): Failure<E> => ({ success: false, error });

// Base application error interface
export interface AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  readonly timestamp?: string;
}

export interface ValidationError extends AppError {
  readonly code: 'VALIDATION_ERROR';
  readonly field?: string;
  readonly validationRules?: string[];
}

export interface NotFoundError extends AppError {
  readonly code: 'NOT_FOUND';
  readonly resource: string;
  readonly id?: string | number;
}

/**
 * Caller-input errors raised by the scoring engine
 */
export type ScoringErrorCode =
  | 'INVALID_FACTOR'
  | 'INVALID_WEIGHTS'
  | 'UNKNOWN_METRIC_FIELD'
  | 'OUT_OF_RANGE_METRIC';

export interface ScoringError extends AppError {
  readonly code: ScoringErrorCode;
  readonly field?: string;
}

// ===== TYPE GUARDS =====

export const isSuccess = <T, E>(result: Result<T, E>): result is Success<T> => {
  return result.success === true;
};

export const isFailure = <T, E>(result: Result<T, E>): result is Failure<E> => {
  return result.success === false;
};

// ===== RESULT TRANSFORMATION UTILITIES =====

/**
 * Chains Results together, similar to Promise.then() but for Results
 *
 * @example
 * ```typescript
 * const checked = chainResult(validateCandidateMetrics(raw), (metrics) =>
 *   success(applyOverrides(metrics, overrides))
 * );
 * ```
 */
export const chainResult = <T, U, E>(
  result: Result<T, E>,
  next: (data: T) => Result<U, E>
): Result<U, E> => {
  return isSuccess(result)
    ? next(result.data)
    : result;
};

/**
 * Returns the success data or throws the carried error
 */
export const unwrapResult = <T, E extends Error>(result: Result<T, E>): T => {
  if (isFailure(result)) {
    throw result.error;
  }
  return result.data;
};
