/**
 * Growth Potential domain schema
 *
 * Canonical factor and metric field lists, the record types derived from them,
 * and the zod schemas used at the HTTP and data-file boundaries.
 *
 * @fileoverview Single source of truth for the shape of candidate metrics,
 * factor weights and candidate records.
 */

import { z } from "zod";

// ===== FACTORS =====

/**
 * Canonical factor order. Also the tie-break order wherever factors are ranked.
 */
export const FACTOR_KEYS = [
  "learning_agility",
  "skill_progression",
  "adaptability",
  "innovation_mindset",
  "feedback_integration",
] as const;

export type FactorKey = (typeof FACTOR_KEYS)[number];

export function isFactorKey(value: string): value is FactorKey {
  return (FACTOR_KEYS as readonly string[]).includes(value);
}

/**
 * "learning_agility" -> "Learning Agility"
 */
export function factorLabel(factor: FactorKey): string {
  return factor
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

// ===== METRICS =====

export const METRIC_FIELDS = [
  // learning_agility
  "certifications",
  "courses_completed",
  "learning_velocity",
  // skill_progression
  "role_transitions",
  "tech_stack_breadth",
  "seniority_growth",
  // adaptability
  "industry_switches",
  "domain_pivots",
  "challenge_response",
  // innovation_mindset
  "side_projects",
  "contributions",
  "patents_publications",
  // feedback_integration
  "performance_improvements",
  "mentorship_sought",
  "self_awareness",
] as const;

export type MetricField = (typeof METRIC_FIELDS)[number];

export function isMetricField(value: string): value is MetricField {
  return (METRIC_FIELDS as readonly string[]).includes(value);
}

/**
 * Raw per-candidate inputs. Non-negative integers or small decimals.
 */
export type CandidateMetrics = Readonly<Record<MetricField, number>>;

export type MetricOverrides = Readonly<Partial<Record<MetricField, number>>>;

/**
 * Top-level factor weights, expressed as percentages summing to 100.
 */
export type FactorWeights = Readonly<Record<FactorKey, number>>;

export type FactorScores = Readonly<Record<FactorKey, number>>;

// ===== TIERS =====

export const SCORE_TIERS = [
  "Exceptional",
  "Strong",
  "Moderate",
  "Developing",
  "Limited",
] as const;

export type ScoreTier = (typeof SCORE_TIERS)[number];

// ===== CANDIDATE RECORDS =====

export const TIMELINE_EVENT_TYPES = ["role", "certification", "achievement"] as const;

export const metricValueSchema = z.number().finite().nonnegative();

const candidateMetricsShape = {
  certifications: metricValueSchema,
  courses_completed: metricValueSchema,
  learning_velocity: metricValueSchema,
  role_transitions: metricValueSchema,
  tech_stack_breadth: metricValueSchema,
  seniority_growth: metricValueSchema,
  industry_switches: metricValueSchema,
  domain_pivots: metricValueSchema,
  challenge_response: metricValueSchema,
  side_projects: metricValueSchema,
  contributions: metricValueSchema,
  patents_publications: metricValueSchema,
  performance_improvements: metricValueSchema,
  mentorship_sought: metricValueSchema,
  self_awareness: metricValueSchema,
} satisfies Record<MetricField, typeof metricValueSchema>;

export const candidateMetricsSchema = z.object(candidateMetricsShape).strict();

export const timelineEventSchema = z.object({
  year: z.number().int().min(1950).max(2100),
  event: z.string().min(1),
  type: z.enum(TIMELINE_EVENT_TYPES),
  seniorityLevel: z.number().int().min(1).max(5),
});

export const candidateRecordSchema = z.object({
  id: z.string().regex(/^[a-z0-9]+(-[a-z0-9]+)*$/, "id must be a kebab-case slug"),
  name: z.string().min(1),
  role: z.string().min(1),
  experienceYears: z.number().nonnegative(),
  background: z.string(),
  metrics: candidateMetricsSchema,
  timeline: z.array(timelineEventSchema),
});

export const candidateRosterSchema = z
  .array(candidateRecordSchema)
  .superRefine((records, ctx) => {
    const seen = new Set<string>();
    records.forEach((record, index) => {
      if (seen.has(record.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, "id"],
          message: `Duplicate candidate id '${record.id}'`,
        });
      }
      seen.add(record.id);
    });
  });

export type TimelineEvent = Readonly<z.infer<typeof timelineEventSchema>>;

export interface CandidateRecord {
  readonly id: string;
  readonly name: string;
  readonly role: string;
  readonly experienceYears: number;
  readonly background: string;
  readonly metrics: CandidateMetrics;
  readonly timeline: readonly TimelineEvent[];
}

// ===== REQUEST SCHEMAS =====

/**
 * Metrics, overrides and weights arrive as plain objects passed through
 * untouched; the scoring engine performs the field-level checks so that its
 * own error codes reach the caller. z.record would drop an own "__proto__"
 * key before the engine could reject it.
 */
function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const looseRecord = z.custom<Record<string, unknown>>(isPlainRecord, {
  message: "Expected an object",
});

export const scoreRequestSchema = z.object({
  metrics: looseRecord,
  weights: looseRecord.optional(),
});

export const factorScoreRequestSchema = z.object({
  metrics: looseRecord,
  factor: z.string().min(1),
});

export const whatIfRequestSchema = z
  .object({
    candidateId: z.string().min(1).optional(),
    metrics: looseRecord.optional(),
    overrides: looseRecord.default({}),
    weights: looseRecord.optional(),
  })
  .refine((body) => (body.candidateId === undefined) !== (body.metrics === undefined), {
    message: "Provide exactly one of candidateId or metrics",
    path: ["candidateId"],
  });

export const weightsQuerySchema = z.object({
  weights: z.string().optional(),
});
