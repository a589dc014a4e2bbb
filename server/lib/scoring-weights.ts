/**
 * Growth Potential Factor Weights
 *
 * Top-level weights combining the five factor scores into the overall score.
 * Weights are percentages and must sum to 100; they are validated, never
 * renormalised, so a caller supplying 99 or 101 gets an error back.
 */

import {
  FACTOR_KEYS,
  isFactorKey,
  type FactorKey,
  type FactorWeights,
} from "../../shared/schema";
import { InvalidWeightsError } from "../../shared/errors";
import { failure, success, type Result } from "../../shared/result-types";

/**
 * Default distribution:
 * - Learning Agility: 30% - how quickly new skills are acquired
 * - Skill Progression: 25% - career trajectory and breadth
 * - Adaptability: 20% - thriving through industry and domain changes
 * - Innovation Mindset: 15% - initiative beyond assigned work
 * - Feedback Integration: 10% - learning from feedback
 *
 * Total: 100
 */
export const DEFAULT_FACTOR_WEIGHTS: FactorWeights = Object.freeze({
  learning_agility: 30,
  skill_progression: 25,
  adaptability: 20,
  innovation_mindset: 15,
  feedback_integration: 10,
});

export const WEIGHT_SUM_TARGET = 100;
export const WEIGHT_SUM_TOLERANCE = 0.01;

/**
 * Validate an untrusted weights mapping
 */
export function validateFactorWeights(
  input: Readonly<Record<string, unknown>> | undefined | null,
): Result<FactorWeights, InvalidWeightsError> {
  if (!input) {
    return failure(new InvalidWeightsError("Factor weights are required"));
  }

  for (const key of Object.keys(input)) {
    if (!isFactorKey(key)) {
      return failure(InvalidWeightsError.unexpected(key));
    }
  }

  const weights: Record<FactorKey, number> = {
    learning_agility: 0,
    skill_progression: 0,
    adaptability: 0,
    innovation_mindset: 0,
    feedback_integration: 0,
  };
  let sum = 0;

  for (const factor of FACTOR_KEYS) {
    const value = input[factor];
    if (value === undefined) {
      return failure(InvalidWeightsError.missing(factor));
    }
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      return failure(InvalidWeightsError.negative(factor, value));
    }
    weights[factor] = value;
    sum += value;
  }

  if (Math.abs(sum - WEIGHT_SUM_TARGET) > WEIGHT_SUM_TOLERANCE) {
    return failure(InvalidWeightsError.badSum(sum, WEIGHT_SUM_TOLERANCE));
  }

  return success(Object.freeze(weights));
}

/**
 * Parse weights written as a comma-separated list in canonical factor order,
 * e.g. "30,25,20,15,10" (environment variables and query strings).
 */
export function parseFactorWeights(raw: string): Result<FactorWeights, InvalidWeightsError> {
  const parts = raw.split(",").map((part) => part.trim());

  if (parts.length !== FACTOR_KEYS.length) {
    return failure(
      new InvalidWeightsError(
        `Expected ${FACTOR_KEYS.length} comma-separated weights (${FACTOR_KEYS.join(", ")}), got ${parts.length}`,
        undefined,
        { raw },
      ),
    );
  }

  const entries: Record<string, number> = {};
  for (const [index, factor] of FACTOR_KEYS.entries()) {
    const part = parts[index];
    const value = part === "" ? Number.NaN : Number(part);
    if (Number.isNaN(value)) {
      return failure(
        new InvalidWeightsError(`Weight for factor '${factor}' is not a number: '${part}'`, factor),
      );
    }
    entries[factor] = value;
  }

  return validateFactorWeights(entries);
}

export function formatFactorWeights(weights: FactorWeights): string {
  return FACTOR_KEYS.map((factor) => weights[factor]).join(",");
}
