/**
 * Explanation Generator
 * Turns factor scores into ranked strengths, development areas and a
 * Markdown summary a dashboard can render as-is.
 */

import {
  FACTOR_KEYS,
  factorLabel,
  type FactorKey,
  type FactorScores,
  type FactorWeights,
  type ScoreTier,
} from "../../shared/schema";
import { computeScoreBreakdown, requireWeights, type ScoreBreakdown } from "./growth-scoring";
import { TIER_CONFIGS } from "./growth-scoring-rubric";

export const MIN_EXPLANATION_HIGHLIGHTS = 1;
// Two strengths plus two gaps never overlap across five factors
export const MAX_EXPLANATION_HIGHLIGHTS = 2;
export const DEFAULT_EXPLANATION_HIGHLIGHTS = MAX_EXPLANATION_HIGHLIGHTS;

export interface FactorHighlight {
  factor: FactorKey;
  label: string;
  score: number;
  weight: number;
}

export interface Explanation {
  overall: number;
  tier: ScoreTier;
  strengths: FactorHighlight[];
  gaps: FactorHighlight[];
  summary: string;
}

export interface ExplainOptions {
  /** Strengths and gaps to report, 1-2 */
  highlights?: number;
}

/**
 * Factors sorted by score, highest first. Ties keep canonical factor order.
 */
export function rankFactors(factorScores: FactorScores): FactorKey[] {
  return [...FACTOR_KEYS].sort(
    (a, b) => factorScores[b] - factorScores[a] || FACTOR_KEYS.indexOf(a) - FACTOR_KEYS.indexOf(b),
  );
}

function resolveHighlights(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested)) {
    return DEFAULT_EXPLANATION_HIGHLIGHTS;
  }
  return Math.min(MAX_EXPLANATION_HIGHLIGHTS, Math.max(MIN_EXPLANATION_HIGHLIGHTS, Math.trunc(requested)));
}

function toHighlight(factor: FactorKey, factorScores: FactorScores, weights: FactorWeights): FactorHighlight {
  return {
    factor,
    label: factorLabel(factor),
    score: factorScores[factor],
    weight: weights[factor],
  };
}

/**
 * Markdown summary of a breakdown and its highlights
 */
export function renderSummary(
  overall: number,
  tier: ScoreTier,
  strengths: readonly FactorHighlight[],
  gaps: readonly FactorHighlight[],
): string {
  const lines: string[] = [
    `**Overall Growth Potential: ${overall}/100 (${tier})**`,
    "",
    TIER_CONFIGS[tier].headline,
  ];

  if (strengths.length > 0) {
    lines.push("", "**Key Strengths:**");
    for (const item of strengths) {
      lines.push(`- ${item.label} (${item.score.toFixed(0)}/100)`);
    }
  }

  if (gaps.length > 0) {
    lines.push("", "**Areas for Development:**");
    for (const item of gaps) {
      lines.push(`- ${item.label} (${item.score.toFixed(0)}/100)`);
    }
  }

  return lines.join("\n");
}

/**
 * Build an explanation from an already computed breakdown
 */
export function explainBreakdown(
  breakdown: ScoreBreakdown,
  weights: FactorWeights,
  options: ExplainOptions = {},
): Explanation {
  const count = resolveHighlights(options.highlights);
  const ranked = rankFactors(breakdown.factorScores);

  const strengths = ranked
    .slice(0, count)
    .map((factor) => toHighlight(factor, breakdown.factorScores, weights));

  // Lowest first; equal scores stay in canonical order
  const gaps = ranked
    .slice(-count)
    .sort(
      (a, b) =>
        breakdown.factorScores[a] - breakdown.factorScores[b] ||
        FACTOR_KEYS.indexOf(a) - FACTOR_KEYS.indexOf(b),
    )
    .map((factor) => toHighlight(factor, breakdown.factorScores, weights));

  return {
    overall: breakdown.overall,
    tier: breakdown.tier,
    strengths,
    gaps,
    summary: renderSummary(breakdown.overall, breakdown.tier, strengths, gaps),
  };
}

/**
 * Strengths and development areas for a candidate's metrics
 */
export function explain(
  metrics: Readonly<Record<string, unknown>>,
  weights: Readonly<Record<string, unknown>>,
  options: ExplainOptions = {},
): Explanation {
  const validWeights = requireWeights(weights);
  const breakdown = computeScoreBreakdown(metrics, validWeights);
  return explainBreakdown(breakdown, validWeights, options);
}
