/**
 * Career Trajectory Analyzer
 * Seniority progression, promotion cadence and a qualitative trajectory
 * pattern derived from a candidate's timeline.
 */

import type { CandidateRecord, TimelineEvent } from "../../shared/schema";
import { roundTo } from "./factor-formulas";

export const SENIORITY_LABELS: Readonly<Record<number, string>> = {
  1: "Junior",
  2: "Mid-Level",
  3: "Senior",
  4: "Lead/Staff",
  5: "Principal/Director",
};

export type TrajectoryAcceleration = "accelerating" | "decelerating" | "stable";

export type TrajectoryPattern =
  | "Early Career"
  | "Fast Riser"
  | "Steady Climber"
  | "Lateral Explorer"
  | "Late Bloomer"
  | "Plateaued"
  | "Developing";

export interface ProgressionStep {
  year: number;
  level: number;
  event: string;
}

export interface Promotion {
  fromLevel: number;
  toLevel: number;
  fromYear: number;
  toYear: number;
  years: number;
  fromRole: string;
  toRole: string;
}

export interface TrajectoryAnalysis {
  progression: ProgressionStep[];
  promotions: Promotion[];
  velocity: number;
  acceleration: TrajectoryAcceleration;
  pattern: TrajectoryPattern;
  narrative: string;
  currentLevel: number;
  levelsGained: number;
  /** Mean gap between promotions, one decimal; null without promotions */
  averagePromotionYears: number | null;
}

export function seniorityLabel(level: number): string {
  return SENIORITY_LABELS[level] ?? "Unknown";
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function levelsGainedOf(progression: readonly ProgressionStep[]): number {
  if (progression.length === 0) {
    return 0;
  }
  return progression[progression.length - 1].level - progression[0].level;
}

/**
 * Role events only, ordered by year (stable for events in the same year)
 */
export function getSeniorityProgression(timeline: readonly TimelineEvent[]): ProgressionStep[] {
  return timeline
    .filter((item) => item.type === "role")
    .map((item) => ({ year: item.year, level: item.seniorityLevel, event: item.event }))
    .sort((a, b) => a.year - b.year);
}

/**
 * Consecutive role steps where the seniority level rises
 */
export function getPromotions(progression: readonly ProgressionStep[]): Promotion[] {
  const promotions: Promotion[] = [];
  for (let i = 0; i < progression.length - 1; i++) {
    const from = progression[i];
    const to = progression[i + 1];
    if (to.level > from.level) {
      promotions.push({
        fromLevel: from.level,
        toLevel: to.level,
        fromYear: from.year,
        toYear: to.year,
        years: to.year - from.year,
        fromRole: from.event,
        toRole: to.event,
      });
    }
  }
  return promotions;
}

/**
 * Levels gained per year of experience, two decimals
 */
export function computeVelocity(progression: readonly ProgressionStep[], experienceYears: number): number {
  if (progression.length === 0 || experienceYears <= 0) {
    return 0;
  }
  return roundTo(levelsGainedOf(progression) / experienceYears, 2);
}

/**
 * Compares the last two promotion gaps with the earlier ones
 */
export function computeAcceleration(promotions: readonly Promotion[]): TrajectoryAcceleration {
  if (promotions.length < 2) {
    return "stable";
  }

  const gaps = promotions.map((promotion) => promotion.years);
  const recent = mean(gaps.slice(-2));
  const earlier = gaps.length > 2 ? mean(gaps.slice(0, -2)) : recent;

  if (recent < earlier * 0.8) {
    return "accelerating";
  }
  if (recent > earlier * 1.2) {
    return "decelerating";
  }
  return "stable";
}

export function classifyPattern(
  progression: readonly ProgressionStep[],
  experienceYears: number,
  promotions: readonly Promotion[],
): TrajectoryPattern {
  if (progression.length === 0 || promotions.length === 0) {
    return "Early Career";
  }

  const velocity = computeVelocity(progression, experienceYears);
  const averageGap = mean(promotions.map((promotion) => promotion.years));
  const levelsGained = levelsGainedOf(progression);

  if (velocity >= 0.4 && averageGap <= 2.5) {
    return "Fast Riser";
  }
  if (velocity >= 0.25 && velocity < 0.4 && averageGap >= 2 && averageGap <= 4) {
    return "Steady Climber";
  }
  if (levelsGained <= 1 && progression.length >= 3) {
    return "Lateral Explorer";
  }

  const acceleration = computeAcceleration(promotions);
  if (acceleration === "accelerating") {
    return "Late Bloomer";
  }
  if (acceleration === "decelerating") {
    return "Plateaued";
  }
  return "Developing";
}

function velocitySentence(velocity: number): string {
  if (velocity >= 0.4) {
    return `With a trajectory velocity of **${velocity} levels/year**, this represents **exceptional career acceleration**, well ahead of typical pacing.`;
  }
  if (velocity >= 0.25) {
    return `With a trajectory velocity of **${velocity} levels/year**, this shows **solid career progression** at a healthy pace.`;
  }
  return `With a trajectory velocity of **${velocity} levels/year**, this indicates **steady, measured growth** with focus on skill deepening.`;
}

function averageGapSentence(averageGap: number): string {
  if (averageGap <= 2) {
    return "This is exceptionally fast, well above market pace.";
  }
  if (averageGap <= 3) {
    return "This is faster than typical industry standards.";
  }
  if (averageGap <= 5) {
    return "This aligns with standard career progression timelines.";
  }
  return "This suggests a focus on mastery before advancement.";
}

function plural(count: number, singular: string, pluralForm: string): string {
  return count === 1 ? singular : pluralForm;
}

/**
 * Markdown narrative of a trajectory
 */
export function buildTrajectoryNarrative(
  candidateName: string,
  progression: readonly ProgressionStep[],
  promotions: readonly Promotion[],
  pattern: TrajectoryPattern,
  velocity: number,
  experienceYears: number,
): string {
  if (progression.length === 0) {
    return "Insufficient career history data.";
  }

  const startLevel = seniorityLabel(progression[0].level);
  const currentLevel = seniorityLabel(progression[progression.length - 1].level);
  const levelsGained = levelsGainedOf(progression);

  const lines: string[] = [
    `**Career Trajectory: ${pattern}**`,
    "",
    `${candidateName} started as a **${startLevel}** professional and is currently at the **${currentLevel}** level, ` +
      `advancing **${levelsGained} ${plural(levelsGained, "level", "levels")}** over **${experienceYears} years**.`,
    "",
    velocitySentence(velocity),
  ];

  if (promotions.length > 0) {
    lines.push("", "**Promotion History:**");
    for (const promotion of promotions) {
      lines.push(
        `- **${promotion.fromYear} → ${promotion.toYear}** (${promotion.years} ${plural(promotion.years, "year", "years")}): ` +
          `${seniorityLabel(promotion.fromLevel)} to ${seniorityLabel(promotion.toLevel)}`,
      );
    }

    const averageGap = mean(promotions.map((promotion) => promotion.years));
    lines.push(
      "",
      `**Average time between promotions:** ${averageGap.toFixed(1)} years`,
      averageGapSentence(averageGap),
    );
  }

  return lines.join("\n");
}

export function analyzeTrajectory(candidate: CandidateRecord): TrajectoryAnalysis {
  const progression = getSeniorityProgression(candidate.timeline);
  const promotions = getPromotions(progression);
  const velocity = computeVelocity(progression, candidate.experienceYears);
  const acceleration = computeAcceleration(promotions);
  const pattern = classifyPattern(progression, candidate.experienceYears, promotions);

  return {
    progression,
    promotions,
    velocity,
    acceleration,
    pattern,
    narrative: buildTrajectoryNarrative(
      candidate.name,
      progression,
      promotions,
      pattern,
      velocity,
      candidate.experienceYears,
    ),
    currentLevel: progression.length > 0 ? progression[progression.length - 1].level : 0,
    levelsGained: levelsGainedOf(progression),
    averagePromotionYears:
      promotions.length > 0 ? roundTo(mean(promotions.map((promotion) => promotion.years)), 1) : null,
  };
}
