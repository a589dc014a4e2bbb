/**
 * Candidate Roster
 *
 * Named candidate records loaded once from server/data/candidates.json,
 * validated and deep-frozen. Callers only ever see the frozen records;
 * every scoring accessor recomputes from them with the weights it is given.
 */

import fs from "fs";
import {
  FACTOR_KEYS,
  candidateRosterSchema,
  type CandidateRecord,
  type FactorKey,
  type FactorScores,
  type ScoreTier,
} from "../../shared/schema";
import { AppNotFoundError, AppValidationError } from "../../shared/errors";
import { computeScoreBreakdown, requireWeights, type ScoreBreakdown } from "./growth-scoring";
import { explainBreakdown, type ExplainOptions, type Explanation } from "./explanation-generator";
import { roundTo } from "./factor-formulas";
import {
  analyzeTrajectory,
  seniorityLabel,
  type ProgressionStep,
  type TrajectoryAcceleration,
  type TrajectoryPattern,
} from "./career-trajectory";
import { logger } from "../config/logger";
import bundledRoster from "../data/candidates.json";

type WeightsInput = Readonly<Record<string, unknown>>;

export interface ScoredCandidate {
  candidate: CandidateRecord;
  breakdown: ScoreBreakdown;
  explanation: Explanation;
}

export interface CandidateRanking {
  id: string;
  name: string;
  role: string;
  overall: number;
  tier: ScoreTier;
}

export interface ComparisonRow {
  id: string;
  name: string;
  overall: number;
  factorScores: FactorScores;
}

export type ComparisonColumn = FactorKey | "overall";

export interface ComparisonMatrix {
  factors: FactorKey[];
  rows: ComparisonRow[];
  /** Ids holding the top value per column; more than one on a tie */
  leaders: Record<ComparisonColumn, string[]>;
}

export interface TrajectoryComparisonRow {
  id: string;
  name: string;
  pattern: TrajectoryPattern;
  currentLevel: number;
  currentLevelLabel: string;
  levelsGained: number;
  velocity: number;
  averagePromotionYears: number | null;
  acceleration: TrajectoryAcceleration;
  progression: ProgressionStep[];
}

export interface RosterSummary {
  topCandidate: CandidateRanking | null;
  averageScore: number;
  candidatesEvaluated: number;
}

function freezeCandidate(record: CandidateRecord): CandidateRecord {
  return Object.freeze({
    ...record,
    metrics: Object.freeze({ ...record.metrics }),
    timeline: Object.freeze(record.timeline.map((event) => Object.freeze({ ...event }))),
  });
}

/**
 * Validate raw roster data and freeze every record
 */
export function parseCandidateRoster(raw: unknown): readonly CandidateRecord[] {
  const parsed = candidateRosterSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new AppValidationError(
      `Invalid candidate roster: ${issue.message}`,
      issue.path.join("."),
      ["schema"],
      { issues: parsed.error.issues.map((item) => ({ path: item.path.join("."), message: item.message })) },
    );
  }
  return Object.freeze(parsed.data.map(freezeCandidate));
}

/**
 * Load a roster from a JSON file, or the bundled server/data/candidates.json
 * when no path is given
 */
export function loadCandidateRoster(filePath?: string): readonly CandidateRecord[] {
  if (filePath === undefined) {
    return parseCandidateRoster(bundledRoster);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new AppValidationError(
      `Candidate roster at ${filePath} could not be read: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      ["json"],
    );
  }

  const roster = parseCandidateRoster(raw);
  logger.debug({ filePath, candidates: roster.length }, "Candidate roster loaded");
  return roster;
}

/**
 * Read-only view over a validated roster
 */
export class CandidateRoster {
  constructor(
    private readonly records: readonly CandidateRecord[],
    private readonly explainOptions: ExplainOptions = {},
  ) {}

  listCandidates(): readonly CandidateRecord[] {
    return this.records;
  }

  getCandidate(id: string): CandidateRecord {
    const candidate = this.records.find((record) => record.id === id);
    if (!candidate) {
      throw AppNotFoundError.candidate(id);
    }
    return candidate;
  }

  scoreCandidate(id: string, weights: WeightsInput): ScoredCandidate {
    const validWeights = requireWeights(weights);
    const candidate = this.getCandidate(id);
    const breakdown = computeScoreBreakdown(candidate.metrics, validWeights);
    return {
      candidate,
      breakdown,
      explanation: explainBreakdown(breakdown, validWeights, this.explainOptions),
    };
  }

  /**
   * Highest overall first; equal scores ordered by name
   */
  rankCandidates(weights: WeightsInput): CandidateRanking[] {
    const validWeights = requireWeights(weights);
    return this.records
      .map((candidate) => {
        const { overall, tier } = computeScoreBreakdown(candidate.metrics, validWeights);
        return { id: candidate.id, name: candidate.name, role: candidate.role, overall, tier };
      })
      .sort((a, b) => b.overall - a.overall || a.name.localeCompare(b.name));
  }

  compareCandidates(weights: WeightsInput): ComparisonMatrix {
    const validWeights = requireWeights(weights);
    const rows: ComparisonRow[] = this.records.map((candidate) => {
      const { factorScores, overall } = computeScoreBreakdown(candidate.metrics, validWeights);
      return { id: candidate.id, name: candidate.name, overall, factorScores };
    });

    const leadersOf = (valueOf: (row: ComparisonRow) => number): string[] => {
      if (rows.length === 0) {
        return [];
      }
      const best = Math.max(...rows.map(valueOf));
      return rows.filter((row) => valueOf(row) === best).map((row) => row.id);
    };

    const leaders: Record<ComparisonColumn, string[]> = {
      learning_agility: leadersOf((row) => row.factorScores.learning_agility),
      skill_progression: leadersOf((row) => row.factorScores.skill_progression),
      adaptability: leadersOf((row) => row.factorScores.adaptability),
      innovation_mindset: leadersOf((row) => row.factorScores.innovation_mindset),
      feedback_integration: leadersOf((row) => row.factorScores.feedback_integration),
      overall: leadersOf((row) => row.overall),
    };

    return { factors: [...FACTOR_KEYS], rows, leaders };
  }

  /**
   * Trajectory metrics and progression series for every candidate, in roster order
   */
  compareTrajectories(): TrajectoryComparisonRow[] {
    return this.records.map((candidate) => {
      const trajectory = analyzeTrajectory(candidate);
      return {
        id: candidate.id,
        name: candidate.name,
        pattern: trajectory.pattern,
        currentLevel: trajectory.currentLevel,
        currentLevelLabel: seniorityLabel(trajectory.currentLevel),
        levelsGained: trajectory.levelsGained,
        velocity: trajectory.velocity,
        averagePromotionYears: trajectory.averagePromotionYears,
        acceleration: trajectory.acceleration,
        progression: trajectory.progression,
      };
    });
  }

  summarizeRoster(weights: WeightsInput): RosterSummary {
    const ranking = this.rankCandidates(weights);
    if (ranking.length === 0) {
      return { topCandidate: null, averageScore: 0, candidatesEvaluated: 0 };
    }

    const total = ranking.reduce((sum, entry) => sum + entry.overall, 0);
    return {
      topCandidate: ranking[0],
      averageScore: roundTo(total / ranking.length, 1),
      candidatesEvaluated: ranking.length,
    };
  }
}
