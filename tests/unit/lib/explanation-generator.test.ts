/**
 * Unit Tests for the Explanation Generator
 */

import { describe, test, expect } from '@jest/globals';
import { explain, explainBreakdown, rankFactors } from '../../../server/lib/explanation-generator';
import type { ScoreBreakdown } from '../../../server/lib/growth-scoring';
import { InvalidWeightsError } from '../../../shared/errors';
import { DEFAULT_WEIGHTS, REFERENCE_METRICS } from '../../helpers/growth-fixtures';

function breakdownOf(scores: [number, number, number, number, number], overall: number): ScoreBreakdown {
  return {
    factorScores: {
      learning_agility: scores[0],
      skill_progression: scores[1],
      adaptability: scores[2],
      innovation_mindset: scores[3],
      feedback_integration: scores[4],
    },
    overall,
    tier: 'Moderate',
  };
}

describe('Explanation Generator', () => {
  describe('explain', () => {
    test('should list the top two strengths and the bottom two gaps', () => {
      const explanation = explain(REFERENCE_METRICS, DEFAULT_WEIGHTS);

      expect(explanation.overall).toBe(79.1);
      expect(explanation.tier).toBe('Strong');
      expect(explanation.strengths).toEqual([
        { factor: 'adaptability', label: 'Adaptability', score: 90, weight: 20 },
        { factor: 'feedback_integration', label: 'Feedback Integration', score: 88, weight: 10 },
      ]);
      expect(explanation.gaps).toEqual([
        { factor: 'innovation_mindset', label: 'Innovation Mindset', score: 60, weight: 15 },
        { factor: 'skill_progression', label: 'Skill Progression', score: 70, weight: 25 },
      ]);
    });

    test('should render a Markdown summary', () => {
      const { summary } = explain(REFERENCE_METRICS, DEFAULT_WEIGHTS);

      expect(summary).toBe(
        [
          '**Overall Growth Potential: 79.1/100 (Strong)**',
          '',
          '**Strong Growth Potential** - This candidate shows solid potential for development and advancement.',
          '',
          '**Key Strengths:**',
          '- Adaptability (90/100)',
          '- Feedback Integration (88/100)',
          '',
          '**Areas for Development:**',
          '- Innovation Mindset (60/100)',
          '- Skill Progression (70/100)',
        ].join('\n')
      );
    });

    test('should honour a single highlight', () => {
      const explanation = explain(REFERENCE_METRICS, DEFAULT_WEIGHTS, { highlights: 1 });
      expect(explanation.strengths.map((item) => item.factor)).toEqual(['adaptability']);
      expect(explanation.gaps.map((item) => item.factor)).toEqual(['innovation_mindset']);
    });

    test('should clamp the highlight count to 1-2', () => {
      const many = explain(REFERENCE_METRICS, DEFAULT_WEIGHTS, { highlights: 5 });
      const none = explain(REFERENCE_METRICS, DEFAULT_WEIGHTS, { highlights: 0 });
      expect(many.strengths).toHaveLength(2);
      expect(many.gaps).toHaveLength(2);
      expect(none.strengths).toHaveLength(1);
      expect(none.gaps).toHaveLength(1);
    });

    test('should reject invalid weights', () => {
      expect(() => explain(REFERENCE_METRICS, { ...DEFAULT_WEIGHTS, adaptability: 21 })).toThrow(
        InvalidWeightsError
      );
    });
  });

  describe('tie handling', () => {
    test('should rank equal scores in canonical factor order', () => {
      const breakdown = breakdownOf([50, 50, 50, 50, 50], 50);
      expect(rankFactors(breakdown.factorScores)).toEqual([
        'learning_agility',
        'skill_progression',
        'adaptability',
        'innovation_mindset',
        'feedback_integration',
      ]);
    });

    test('should never report the same factor as strength and gap', () => {
      const explanation = explainBreakdown(breakdownOf([50, 50, 50, 50, 50], 50), DEFAULT_WEIGHTS);
      expect(explanation.strengths.map((item) => item.factor)).toEqual(['learning_agility', 'skill_progression']);
      expect(explanation.gaps.map((item) => item.factor)).toEqual(['innovation_mindset', 'feedback_integration']);
    });

    test('should order gaps lowest first with ties in canonical order', () => {
      const explanation = explainBreakdown(breakdownOf([80, 40, 75, 40, 90], 62), DEFAULT_WEIGHTS);
      expect(explanation.gaps.map((item) => item.factor)).toEqual(['skill_progression', 'innovation_mindset']);
      expect(explanation.strengths.map((item) => item.factor)).toEqual(['feedback_integration', 'learning_agility']);
    });

    test('should give identical output for identical input', () => {
      const first = explain(REFERENCE_METRICS, DEFAULT_WEIGHTS);
      const second = explain({ ...REFERENCE_METRICS }, { ...DEFAULT_WEIGHTS });
      expect(second).toEqual(first);
    });
  });

  test('should print scores without decimals in the summary', () => {
    const explanation = explainBreakdown(breakdownOf([76.5, 61.5, 48, 69, 52], 63.5), DEFAULT_WEIGHTS);
    expect(explanation.summary).toContain('- Learning Agility (77/100)');
    expect(explanation.summary).toContain('- Adaptability (48/100)');
  });
});
