/**
 * Factor Formulas
 *
 * One formula per growth factor, registered by factor name so scoring
 * dispatches uniformly. Every formula has the same shape:
 *
 *   cap -> rescale (0-100) -> weighted combine -> clamp
 *
 * Each component clips its raw metric to [0, cap] and rescales it to a 0-100
 * contribution; "lower is better" components are inverted. Component weights
 * inside a factor sum to 1 and are independent of the top-level FactorWeights.
 */

import {
  FACTOR_KEYS,
  type CandidateMetrics,
  type FactorKey,
  type MetricField,
} from "../../shared/schema";

export interface FormulaComponent {
  field: MetricField;
  /** Realistic maximum; larger raw values contribute the same as the cap */
  cap: number;
  /** True when a smaller raw value is the better outcome */
  invert: boolean;
  /** Share of the factor score, 0-1 */
  weight: number;
  description: string;
}

export interface FactorFormula {
  factor: FactorKey;
  description: string;
  components: readonly FormulaComponent[];
}

export const FACTOR_FORMULAS: Readonly<Record<FactorKey, FactorFormula>> = {
  learning_agility: {
    factor: "learning_agility",
    description: "How quickly new skills are acquired",
    components: [
      { field: "certifications", cap: 5, invert: false, weight: 0.4, description: "Certifications earned" },
      { field: "courses_completed", cap: 10, invert: false, weight: 0.3, description: "Courses completed in the last 12 months" },
      { field: "learning_velocity", cap: 12, invert: true, weight: 0.3, description: "Months between skill acquisitions" },
    ],
  },
  skill_progression: {
    factor: "skill_progression",
    description: "Career trajectory and skill development",
    components: [
      { field: "role_transitions", cap: 4, invert: false, weight: 0.35, description: "Meaningful role changes" },
      { field: "tech_stack_breadth", cap: 15, invert: false, weight: 0.4, description: "Technologies mastered" },
      { field: "seniority_growth", cap: 15, invert: true, weight: 0.25, description: "Years to reach the current level" },
    ],
  },
  adaptability: {
    factor: "adaptability",
    description: "Ability to thrive in changing environments",
    components: [
      { field: "industry_switches", cap: 3, invert: false, weight: 0.3, description: "Industry switches" },
      { field: "domain_pivots", cap: 3, invert: false, weight: 0.3, description: "Major technology or role pivots" },
      { field: "challenge_response", cap: 10, invert: false, weight: 0.4, description: "Behavioural interview score (0-10)" },
    ],
  },
  innovation_mindset: {
    factor: "innovation_mindset",
    description: "Creative problem-solving and initiative",
    components: [
      { field: "side_projects", cap: 8, invert: false, weight: 0.4, description: "Personal or open-source projects" },
      { field: "contributions", cap: 10, invert: false, weight: 0.35, description: "Meaningful contributions to teams" },
      { field: "patents_publications", cap: 5, invert: false, weight: 0.25, description: "Patents, papers or technical posts" },
    ],
  },
  feedback_integration: {
    factor: "feedback_integration",
    description: "How well feedback turns into improvement",
    components: [
      { field: "performance_improvements", cap: 5, invert: false, weight: 0.4, description: "Documented improvements after feedback" },
      { field: "mentorship_sought", cap: 10, invert: false, weight: 0.3, description: "Actively seeks mentorship (0-10)" },
      { field: "self_awareness", cap: 10, invert: false, weight: 0.3, description: "Demonstrated self-awareness (0-10)" },
    ],
  },
};

// Validate component weights sum to 1.0 per factor
for (const factor of FACTOR_KEYS) {
  const total = FACTOR_FORMULAS[factor].components.reduce((sum, component) => sum + component.weight, 0);
  if (Math.abs(total - 1.0) > 0.001) {
    throw new Error(`Component weights for '${factor}' must sum to 1.0, current sum: ${total}`);
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  // `|| 0` folds -0 into 0
  return Math.round(value * factor) / factor || 0;
}

/**
 * Clip a raw metric to [0, cap] and rescale it to 0-100
 */
export function rescaleComponent(value: number, component: FormulaComponent): number {
  const ratio = clamp(value, 0, component.cap) / component.cap;
  return (component.invert ? 1 - ratio : ratio) * 100;
}

/**
 * Evaluate a factor formula against validated metrics. Result is clamped to
 * [0, 100] and rounded to one decimal place.
 */
export function evaluateFormula(formula: FactorFormula, metrics: CandidateMetrics): number {
  const combined = formula.components.reduce(
    (sum, component) => sum + rescaleComponent(metrics[component.field], component) * component.weight,
    0,
  );
  return roundTo(clamp(combined, 0, 100), 1);
}
