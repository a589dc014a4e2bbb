/**
 * Growth Potential Scoring Rubric
 *
 * Tier thresholds and the wording attached to each tier, shared by the
 * scoring engine, the explanation generator and the HTTP config endpoint.
 */

import { SCORE_TIERS, type ScoreTier } from "../../shared/schema";
import { OutOfRangeMetricError } from "../../shared/errors";

// Lower bounds, inclusive
export const TIER_THRESHOLDS = {
  EXCEPTIONAL: 85, // ≥85 - outstanding ability to learn, adapt and evolve
  STRONG: 70,      // 70-84.9
  MODERATE: 55,    // 55-69.9
  DEVELOPING: 40,  // 40-54.9
  LIMITED: 0,      // <40
} as const;

export interface TierConfig {
  tier: ScoreTier;
  threshold: number;
  range: string;
  headline: string;
}

export const TIER_CONFIGS: Readonly<Record<ScoreTier, TierConfig>> = {
  Exceptional: {
    tier: "Exceptional",
    threshold: TIER_THRESHOLDS.EXCEPTIONAL,
    range: "≥85",
    headline:
      "**Exceptional Growth Potential** - This candidate demonstrates outstanding ability to learn, adapt, and evolve.",
  },
  Strong: {
    tier: "Strong",
    threshold: TIER_THRESHOLDS.STRONG,
    range: "70-84.9",
    headline:
      "**Strong Growth Potential** - This candidate shows solid potential for development and advancement.",
  },
  Moderate: {
    tier: "Moderate",
    threshold: TIER_THRESHOLDS.MODERATE,
    range: "55-69.9",
    headline:
      "**Moderate Growth Potential** - This candidate shows growth in some areas with clear room to build on others.",
  },
  Developing: {
    tier: "Developing",
    threshold: TIER_THRESHOLDS.DEVELOPING,
    range: "40-54.9",
    headline:
      "**Developing Growth Potential** - This candidate has room to strengthen their growth trajectory.",
  },
  Limited: {
    tier: "Limited",
    threshold: TIER_THRESHOLDS.LIMITED,
    range: "<40",
    headline:
      "**Limited Growth Potential** - Current evidence shows few growth signals; targeted development would be needed.",
  },
};

/**
 * Map an overall score in [0, 100] to exactly one tier
 */
export function classifyTier(overallScore: number): ScoreTier {
  if (!Number.isFinite(overallScore) || overallScore < 0 || overallScore > 100) {
    throw new OutOfRangeMetricError("overall_score", overallScore, "a number between 0 and 100");
  }

  // SCORE_TIERS runs from the highest band down
  for (const tier of SCORE_TIERS) {
    if (overallScore >= TIER_CONFIGS[tier].threshold) {
      return tier;
    }
  }
  return "Limited";
}
