/**
 * Growth Potential Scoring Engine
 *
 * Pure, synchronous scoring over explicit inputs: five factor scores from a
 * candidate's metrics, a weighted overall score, and its tier. Nothing is
 * cached; every call recomputes from its arguments.
 */

import {
  FACTOR_KEYS,
  isFactorKey,
  type CandidateMetrics,
  type FactorKey,
  type FactorScores,
  type FactorWeights,
  type ScoreTier,
} from "../../shared/schema";
import { InvalidFactorError } from "../../shared/errors";
import { unwrapResult } from "../../shared/result-types";
import { FACTOR_FORMULAS, clamp, evaluateFormula, roundTo } from "./factor-formulas";
import { validateFactorWeights } from "./scoring-weights";
import { validateCandidateMetrics } from "./candidate-metrics";
import { classifyTier } from "./growth-scoring-rubric";
import { logger } from "../config/logger";

export { classifyTier };

export interface ScoreBreakdown {
  factorScores: FactorScores;
  overall: number;
  tier: ScoreTier;
}

type MetricsInput = Readonly<Record<string, unknown>>;
type WeightsInput = Readonly<Record<string, unknown>>;

/**
 * Validates untrusted metrics, throwing UnknownMetricField or OutOfRangeMetric
 */
export function requireMetrics(metrics: MetricsInput): CandidateMetrics {
  return unwrapResult(validateCandidateMetrics(metrics));
}

/**
 * Validates untrusted weights, throwing InvalidWeights
 */
export function requireWeights(weights: WeightsInput | undefined | null): FactorWeights {
  return unwrapResult(validateFactorWeights(weights));
}

function scoreAllFactors(metrics: CandidateMetrics): FactorScores {
  const scores: Record<FactorKey, number> = {
    learning_agility: 0,
    skill_progression: 0,
    adaptability: 0,
    innovation_mindset: 0,
    feedback_integration: 0,
  };
  for (const factor of FACTOR_KEYS) {
    scores[factor] = evaluateFormula(FACTOR_FORMULAS[factor], metrics);
  }
  return Object.freeze(scores);
}

/**
 * Weighted sum of factor scores, rounded to one decimal place
 */
export function combineFactorScores(factorScores: FactorScores, weights: FactorWeights): number {
  const total = FACTOR_KEYS.reduce(
    (sum, factor) => sum + (factorScores[factor] * weights[factor]) / 100,
    0,
  );
  return roundTo(clamp(total, 0, 100), 1);
}

/**
 * Score one factor. Fails with InvalidFactor for a name outside the five
 * recognised keys; never returns 0 for an unknown factor.
 */
export function computeFactorScore(metrics: MetricsInput, factorName: string): number {
  if (!isFactorKey(factorName)) {
    throw new InvalidFactorError(factorName);
  }
  return evaluateFormula(FACTOR_FORMULAS[factorName], requireMetrics(metrics));
}

/**
 * All factor scores, the overall score and its tier in one pass
 */
export function computeScoreBreakdown(metrics: MetricsInput, weights: WeightsInput): ScoreBreakdown {
  const validWeights = requireWeights(weights);
  const factorScores = scoreAllFactors(requireMetrics(metrics));
  const overall = combineFactorScores(factorScores, validWeights);

  logger.debug({ factorScores, overall }, "Computed growth potential breakdown");

  return {
    factorScores,
    overall,
    tier: classifyTier(overall),
  };
}

export function computeOverallScore(metrics: MetricsInput, weights: WeightsInput): number {
  return computeScoreBreakdown(metrics, weights).overall;
}
