/**
 * Unified Configuration System
 *
 * Single source of truth for application configuration, built once from
 * environment variables. Invalid scoring configuration fails at load time.
 */

import { logger } from "./logger";
import { Environment, parseEnvironment } from "../types/environment";
import {
  DEFAULT_FACTOR_WEIGHTS,
  formatFactorWeights,
  parseFactorWeights,
} from "../lib/scoring-weights";
import {
  DEFAULT_EXPLANATION_HIGHLIGHTS,
  MAX_EXPLANATION_HIGHLIGHTS,
  MIN_EXPLANATION_HIGHLIGHTS,
} from "../lib/explanation-generator";
import { unwrapResult } from "../../shared/result-types";
import type { FactorWeights } from "../../shared/schema";

export interface AppConfig {
  env: Environment;
  port: number;

  security: {
    corsOrigins: string[];
  };

  scoring: {
    /** Weights applied when a request does not carry its own */
    defaultWeights: FactorWeights;
    /** Number of strengths and of development areas reported by explain() */
    explanationHighlights: number;
    /** Candidate roster file; the bundled roster when unset */
    rosterPath?: string;
  };
}

function parseInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function clampNumber(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Generate CORS origins based on environment
 */
function getCorsOrigins(env: Environment): string[] {
  const baseOrigins = [
    "http://localhost:3000",
    "http://localhost:5000",
    "http://localhost:5173",
  ];

  if (env === Environment.Development || env === Environment.Test) {
    return baseOrigins;
  }

  const customOrigins = (process.env.CORS_ORIGINS ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return Array.from(new Set([...baseOrigins, ...customOrigins]));
}

/**
 * Build the configuration object from the current environment
 */
export function loadUnifiedConfig(): AppConfig {
  const env = parseEnvironment(process.env.NODE_ENV);
  const port = parseInteger(process.env.PORT, 5000);

  const rawWeights = process.env.GROWTH_FACTOR_WEIGHTS?.trim();
  // Throws InvalidWeightsError on a malformed value
  const defaultWeights = rawWeights
    ? unwrapResult(parseFactorWeights(rawWeights))
    : DEFAULT_FACTOR_WEIGHTS;

  const explanationHighlights = clampNumber(
    parseInteger(process.env.EXPLANATION_HIGHLIGHTS, DEFAULT_EXPLANATION_HIGHLIGHTS),
    MIN_EXPLANATION_HIGHLIGHTS,
    MAX_EXPLANATION_HIGHLIGHTS,
  );

  const rosterPath = process.env.CANDIDATE_ROSTER_PATH?.trim() || undefined;

  const config: AppConfig = {
    env,
    port,
    security: {
      corsOrigins: getCorsOrigins(env),
    },
    scoring: {
      defaultWeights,
      explanationHighlights,
      rosterPath,
    },
  };

  logConfigurationSummary(config);

  return config;
}

function logConfigurationSummary(config: AppConfig): void {
  logger.info(
    {
      environment: config.env,
      port: config.port,
      defaultWeights: formatFactorWeights(config.scoring.defaultWeights),
      explanationHighlights: config.scoring.explanationHighlights,
      rosterPath: config.scoring.rosterPath ?? "bundled",
    },
    "Application configuration loaded",
  );
}

// Export singleton configuration
export const config = loadUnifiedConfig();
