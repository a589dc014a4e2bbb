/**
 * Unit Tests for the Unified Configuration
 */

import { afterEach, beforeEach, describe, test, expect } from '@jest/globals';
import { config, loadUnifiedConfig } from '../../../server/config/unified-config';
import { Environment } from '../../../server/types/environment';
import { InvalidWeightsError } from '../../../shared/errors';

const MANAGED_KEYS = [
  'NODE_ENV',
  'PORT',
  'CORS_ORIGINS',
  'GROWTH_FACTOR_WEIGHTS',
  'EXPLANATION_HIGHLIGHTS',
  'CANDIDATE_ROSTER_PATH',
] as const;

describe('Unified Configuration', () => {
  let saved: Partial<Record<(typeof MANAGED_KEYS)[number], string>>;

  beforeEach(() => {
    saved = {};
    for (const key of MANAGED_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    process.env.NODE_ENV = 'test';
  });

  afterEach(() => {
    for (const key of MANAGED_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  test('should load defaults at import', () => {
    expect(config.env).toBe(Environment.Test);
    expect(config.scoring.defaultWeights).toEqual({
      learning_agility: 30,
      skill_progression: 25,
      adaptability: 20,
      innovation_mindset: 15,
      feedback_integration: 10,
    });
    expect(config.scoring.explanationHighlights).toBe(2);
  });

  test('should read the port', () => {
    process.env.PORT = '8080';
    expect(loadUnifiedConfig().port).toBe(8080);
  });

  test('should fall back to port 5000 on a non-numeric value', () => {
    process.env.PORT = 'eighty';
    expect(loadUnifiedConfig().port).toBe(5000);
  });

  test('should parse default weights from the environment', () => {
    process.env.GROWTH_FACTOR_WEIGHTS = '20,20,20,20,20';
    expect(loadUnifiedConfig().scoring.defaultWeights).toEqual({
      learning_agility: 20,
      skill_progression: 20,
      adaptability: 20,
      innovation_mindset: 20,
      feedback_integration: 20,
    });
  });

  test('should fail fast on weights that do not sum to 100', () => {
    process.env.GROWTH_FACTOR_WEIGHTS = '30,25,20,15,9';
    expect(() => loadUnifiedConfig()).toThrow(InvalidWeightsError);
  });

  test('should fail fast on malformed weights', () => {
    process.env.GROWTH_FACTOR_WEIGHTS = '30,25,20';
    expect(() => loadUnifiedConfig()).toThrow(InvalidWeightsError);
  });

  test.each([
    ['1', 1],
    ['2', 2],
    ['7', 2],
    ['0', 1],
    ['many', 2],
  ])('should clamp EXPLANATION_HIGHLIGHTS=%s to %d', (raw, expected) => {
    process.env.EXPLANATION_HIGHLIGHTS = raw;
    expect(loadUnifiedConfig().scoring.explanationHighlights).toBe(expected);
  });

  test('should add custom CORS origins in production', () => {
    process.env.NODE_ENV = 'production';
    process.env.CORS_ORIGINS = 'https://dashboard.example.com, http://localhost:3000';
    expect(loadUnifiedConfig().security.corsOrigins).toEqual([
      'http://localhost:3000',
      'http://localhost:5000',
      'http://localhost:5173',
      'https://dashboard.example.com',
    ]);
  });

  test('should ignore custom CORS origins outside production', () => {
    process.env.CORS_ORIGINS = 'https://dashboard.example.com';
    expect(loadUnifiedConfig().security.corsOrigins).not.toContain('https://dashboard.example.com');
  });

  test('should read the roster path', () => {
    expect(loadUnifiedConfig().scoring.rosterPath).toBeUndefined();
    process.env.CANDIDATE_ROSTER_PATH = '/srv/roster.json';
    expect(loadUnifiedConfig().scoring.rosterPath).toBe('/srv/roster.json');
  });
});
