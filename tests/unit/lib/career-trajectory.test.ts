/**
 * Unit Tests for the Career Trajectory Analyzer
 */

import { describe, test, expect } from '@jest/globals';
import {
  analyzeTrajectory,
  buildTrajectoryNarrative,
  classifyPattern,
  computeAcceleration,
  computeVelocity,
  getPromotions,
  getSeniorityProgression,
  type ProgressionStep,
} from '../../../server/lib/career-trajectory';
import { CandidateRoster, loadCandidateRoster } from '../../../server/lib/candidate-roster';
import type { CandidateRecord, TimelineEvent } from '../../../shared/schema';
import { REFERENCE_METRICS } from '../../helpers/growth-fixtures';

function steps(...entries: Array<[number, number]>): ProgressionStep[] {
  return entries.map(([year, level]) => ({ year, level, event: `Level ${level} role` }));
}

describe('Career Trajectory Analyzer', () => {
  const roster = new CandidateRoster(loadCandidateRoster());

  describe('getSeniorityProgression', () => {
    test('should keep role events only, sorted by year', () => {
      const timeline: TimelineEvent[] = [
        { year: 2021, event: 'Team Lead', type: 'role', seniorityLevel: 4 },
        { year: 2019, event: 'Certification', type: 'certification', seniorityLevel: 2 },
        { year: 2018, event: 'Engineer', type: 'role', seniorityLevel: 2 },
        { year: 2020, event: 'Award', type: 'achievement', seniorityLevel: 3 },
      ];
      expect(getSeniorityProgression(timeline)).toEqual([
        { year: 2018, level: 2, event: 'Engineer' },
        { year: 2021, level: 4, event: 'Team Lead' },
      ]);
    });
  });

  describe('getPromotions', () => {
    test('should record only steps where the level rises', () => {
      expect(getPromotions(steps([2015, 1], [2017, 1], [2019, 2], [2020, 1], [2023, 3]))).toEqual([
        {
          fromLevel: 1,
          toLevel: 2,
          fromYear: 2017,
          toYear: 2019,
          years: 2,
          fromRole: 'Level 1 role',
          toRole: 'Level 2 role',
        },
        {
          fromLevel: 1,
          toLevel: 3,
          fromYear: 2020,
          toYear: 2023,
          years: 3,
          fromRole: 'Level 1 role',
          toRole: 'Level 3 role',
        },
      ]);
    });
  });

  describe('computeVelocity', () => {
    test('should divide levels gained by years of experience', () => {
      expect(computeVelocity(steps([2018, 1], [2024, 4]), 6)).toBe(0.5);
      expect(computeVelocity(steps([2016, 2], [2023, 3]), 9)).toBe(0.11);
    });

    test('should return 0 without history or experience', () => {
      expect(computeVelocity([], 5)).toBe(0);
      expect(computeVelocity(steps([2018, 1], [2024, 4]), 0)).toBe(0);
    });
  });

  describe('computeAcceleration', () => {
    test('should compare the last two gaps with the earlier ones', () => {
      const promotionsWithGaps = (...gaps: number[]) =>
        getPromotions(steps(...gaps.reduce<Array<[number, number]>>(
          (acc, gap, index) => [...acc, [acc[acc.length - 1][0] + gap, index + 2]],
          [[2000, 1]]
        )));

      expect(computeAcceleration(promotionsWithGaps(4, 4, 1, 1))).toBe('accelerating');
      expect(computeAcceleration(promotionsWithGaps(1, 1, 4, 4))).toBe('decelerating');
      expect(computeAcceleration(promotionsWithGaps(2, 2, 2))).toBe('stable');
      expect(computeAcceleration(promotionsWithGaps(3))).toBe('stable');
    });
  });

  describe('classifyPattern', () => {
    const classify = (progression: ProgressionStep[], years: number) =>
      classifyPattern(progression, years, getPromotions(progression));

    test.each([
      ['Early Career', steps([2022, 1]), 3],
      ['Fast Riser', steps([2018, 1], [2020, 2], [2022, 3], [2024, 4]), 6],
      ['Steady Climber', steps([2021, 2], [2022, 2], [2024, 3]), 4],
      ['Lateral Explorer', steps([2016, 2], [2018, 2], [2020, 2], [2023, 3]), 9],
      ['Late Bloomer', steps([2000, 1], [2005, 2], [2010, 3], [2011, 4], [2012, 5]), 20],
      ['Plateaued', steps([2000, 1], [2001, 2], [2002, 3], [2007, 4], [2012, 5]), 20],
      ['Developing', steps([2000, 1], [2010, 3]), 20],
    ])('should classify %s', (pattern, progression, years) => {
      expect(classify(progression, years)).toBe(pattern);
    });
  });

  describe('buildTrajectoryNarrative', () => {
    test('should report missing history', () => {
      expect(buildTrajectoryNarrative('Test Candidate', [], [], 'Early Career', 0, 0)).toBe(
        'Insufficient career history data.'
      );
    });

    test('should describe a career without promotions', () => {
      const trajectory = analyzeTrajectory(roster.getCandidate('hana-sato'));
      expect(trajectory.narrative).toBe(
        [
          '**Career Trajectory: Early Career**',
          '',
          'Hana Sato started as a **Junior** professional and is currently at the **Junior** level, advancing **0 levels** over **3 years**.',
          '',
          'With a trajectory velocity of **0 levels/year**, this indicates **steady, measured growth** with focus on skill deepening.',
        ].join('\n')
      );
    });

    test('should list promotions and the average gap', () => {
      const { narrative } = analyzeTrajectory(roster.getCandidate('elena-vasquez'));
      const lines = narrative.split('\n');

      expect(lines[0]).toBe('**Career Trajectory: Fast Riser**');
      expect(lines).toContain('**Promotion History:**');
      expect(lines).toContain('- **2018 → 2020** (2 years): Junior to Mid-Level');
      expect(lines).toContain('- **2022 → 2024** (2 years): Senior to Lead/Staff');
      expect(lines.slice(-2)).toEqual([
        '**Average time between promotions:** 2.0 years',
        'This is exceptionally fast, well above market pace.',
      ]);
    });
  });

  describe('analyzeTrajectory', () => {
    test.each([
      ['elena-vasquez', 'Fast Riser', 0.5, 4, 3],
      ['tomasz-nowak', 'Lateral Explorer', 0.11, 3, 1],
      ['kwame-mensah', 'Steady Climber', 0.25, 3, 1],
      ['hana-sato', 'Early Career', 0, 1, 0],
    ])('should analyse %s as %s', (id, pattern, velocity, currentLevel, levelsGained) => {
      const trajectory = analyzeTrajectory(roster.getCandidate(id));
      expect(trajectory.pattern).toBe(pattern);
      expect(trajectory.velocity).toBe(velocity);
      expect(trajectory.currentLevel).toBe(currentLevel);
      expect(trajectory.levelsGained).toBe(levelsGained);
    });

    test.each([
      ['elena-vasquez', 2],
      ['tomasz-nowak', 3],
      ['kwame-mensah', 2],
    ])('should average the promotion gaps of %s', (id, years) => {
      expect(analyzeTrajectory(roster.getCandidate(id)).averagePromotionYears).toBe(years);
    });

    test('should leave the average promotion gap null without promotions', () => {
      expect(analyzeTrajectory(roster.getCandidate('hana-sato')).averagePromotionYears).toBeNull();
    });

    test('should round an uneven promotion average to one decimal', () => {
      const candidate: CandidateRecord = {
        id: 'uneven-gaps',
        name: 'Test Candidate',
        role: 'Engineer',
        experienceYears: 8,
        background: '',
        metrics: REFERENCE_METRICS,
        timeline: [
          { year: 2010, event: 'Junior Engineer', type: 'role', seniorityLevel: 1 },
          { year: 2012, event: 'Engineer', type: 'role', seniorityLevel: 2 },
          { year: 2013, event: 'Senior Engineer', type: 'role', seniorityLevel: 3 },
          { year: 2017, event: 'Staff Engineer', type: 'role', seniorityLevel: 4 },
        ],
      };
      expect(analyzeTrajectory(candidate).averagePromotionYears).toBe(2.3);
    });

    test('should report acceleration for the roster', () => {
      expect(analyzeTrajectory(roster.getCandidate('elena-vasquez')).acceleration).toBe('stable');
    });
  });
});
