/**
 * What-If Simulator
 *
 * Recomputes the full breakdown against a hypothetical snapshot built from a
 * base snapshot plus field overrides, and reports how far each score moved.
 * The base snapshot is never touched; calls share no state.
 */

import {
  FACTOR_KEYS,
  type CandidateMetrics,
  type FactorKey,
  type FactorScores,
  type ScoreTier,
} from "../../shared/schema";
import { unwrapResult } from "../../shared/result-types";
import { buildWhatIfSnapshot } from "./candidate-metrics";
import { computeScoreBreakdown, requireWeights } from "./growth-scoring";
import { explainBreakdown, type ExplainOptions, type Explanation } from "./explanation-generator";
import { roundTo } from "./factor-formulas";
import { logger } from "../config/logger";

export interface ScoreDelta {
  factors: Readonly<Record<FactorKey, number>>;
  overall: number;
  /** Set when the snapshot lands in a different tier */
  tierChange: { from: ScoreTier; to: ScoreTier } | null;
}

export interface WhatIfResult {
  metrics: CandidateMetrics;
  factorScores: FactorScores;
  overall: number;
  tier: ScoreTier;
  explanation: Explanation;
  delta: ScoreDelta;
}

export function whatIf(
  baseMetrics: Readonly<Record<string, unknown>>,
  overrides: Readonly<Record<string, unknown>>,
  weights: Readonly<Record<string, unknown>>,
  options: ExplainOptions = {},
): WhatIfResult {
  const validWeights = requireWeights(weights);
  const { base, snapshot } = unwrapResult(buildWhatIfSnapshot(baseMetrics, overrides));

  const baseline = computeScoreBreakdown(base, validWeights);
  const simulated = computeScoreBreakdown(snapshot, validWeights);

  const factorDeltas: Record<FactorKey, number> = {
    learning_agility: 0,
    skill_progression: 0,
    adaptability: 0,
    innovation_mindset: 0,
    feedback_integration: 0,
  };
  for (const factor of FACTOR_KEYS) {
    factorDeltas[factor] = roundTo(simulated.factorScores[factor] - baseline.factorScores[factor], 1);
  }

  const delta: ScoreDelta = {
    factors: Object.freeze(factorDeltas),
    overall: roundTo(simulated.overall - baseline.overall, 1),
    tierChange: simulated.tier === baseline.tier ? null : { from: baseline.tier, to: simulated.tier },
  };

  logger.debug(
    { overrides: Object.keys(overrides), overallDelta: delta.overall },
    "What-if scenario evaluated",
  );

  return {
    metrics: snapshot,
    factorScores: simulated.factorScores,
    overall: simulated.overall,
    tier: simulated.tier,
    explanation: explainBreakdown(simulated, validWeights, options),
    delta,
  };
}
