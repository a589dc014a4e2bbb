/**
 * Candidate metric snapshots
 *
 * Boundary checks for CandidateMetrics and what-if overrides, and the
 * copy-on-write construction of what-if snapshots. Snapshots are frozen;
 * nothing here mutates its input.
 */

import {
  METRIC_FIELDS,
  isMetricField,
  type CandidateMetrics,
  type MetricField,
  type MetricOverrides,
} from "../../shared/schema";
import { OutOfRangeMetricError, UnknownMetricFieldError } from "../../shared/errors";
import { chainResult, failure, success, type Result } from "../../shared/result-types";

export type MetricValidationError = OutOfRangeMetricError | UnknownMetricFieldError;

const NON_NEGATIVE = "a finite number >= 0";

function checkMetricValue(field: string, value: unknown): OutOfRangeMetricError | null {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    return new OutOfRangeMetricError(field, value, NON_NEGATIVE);
  }
  return null;
}

function findUnknownField(input: object): string | undefined {
  return Object.keys(input).find((key) => !isMetricField(key));
}

/**
 * Validate an untrusted metrics mapping. Every recognised field must be present.
 */
export function validateCandidateMetrics(
  input: Readonly<Record<string, unknown>>,
): Result<CandidateMetrics, MetricValidationError> {
  const unknownField = findUnknownField(input);
  if (unknownField !== undefined) {
    return failure(new UnknownMetricFieldError(unknownField));
  }

  const metrics: Partial<Record<MetricField, number>> = {};
  for (const field of METRIC_FIELDS) {
    const value = input[field];
    const error = checkMetricValue(field, value);
    if (error) {
      return failure(error);
    }
    if (typeof value === "number") {
      metrics[field] = value;
    }
  }

  return success(freezeMetrics(metrics));
}

/**
 * Validate what-if overrides: known fields only, non-negative finite values
 */
export function validateOverrides(
  input: Readonly<Record<string, unknown>>,
): Result<MetricOverrides, MetricValidationError> {
  const overrides: Partial<Record<MetricField, number>> = {};

  for (const [key, value] of Object.entries(input)) {
    if (!isMetricField(key)) {
      return failure(new UnknownMetricFieldError(key));
    }
    const error = checkMetricValue(key, value);
    if (error) {
      return failure(error);
    }
    if (typeof value === "number") {
      overrides[key] = value;
    }
  }

  return success(Object.freeze(overrides));
}

/**
 * New frozen snapshot equal to `base` with `overrides` applied field by field
 */
export function applyOverrides(base: CandidateMetrics, overrides: MetricOverrides): CandidateMetrics {
  const next: Partial<Record<MetricField, number>> = {};
  for (const field of METRIC_FIELDS) {
    next[field] = overrides[field] ?? base[field];
  }
  return freezeMetrics(next);
}

/**
 * Validate a base snapshot and overrides together, then build the what-if snapshot
 */
export function buildWhatIfSnapshot(
  base: Readonly<Record<string, unknown>>,
  overrides: Readonly<Record<string, unknown>>,
): Result<{ base: CandidateMetrics; snapshot: CandidateMetrics }, MetricValidationError> {
  return chainResult(validateCandidateMetrics(base), (validBase) =>
    chainResult(validateOverrides(overrides), (validOverrides) =>
      success({ base: validBase, snapshot: applyOverrides(validBase, validOverrides) }),
    ),
  );
}

function freezeMetrics(values: Partial<Record<MetricField, number>>): CandidateMetrics {
  const metrics: Record<MetricField, number> = {
    certifications: 0,
    courses_completed: 0,
    learning_velocity: 0,
    role_transitions: 0,
    tech_stack_breadth: 0,
    seniority_growth: 0,
    industry_switches: 0,
    domain_pivots: 0,
    challenge_response: 0,
    side_projects: 0,
    contributions: 0,
    patents_publications: 0,
    performance_improvements: 0,
    mentorship_sought: 0,
    self_awareness: 0,
  };
  for (const field of METRIC_FIELDS) {
    const value = values[field];
    if (value !== undefined) {
      metrics[field] = value;
    }
  }
  return Object.freeze(metrics);
}
