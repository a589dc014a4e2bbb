/**
 * Scoring Routes
 * Stateless scoring over metrics supplied in the request body
 */

import { Router, Request, Response } from "express";
import {
  FACTOR_KEYS,
  factorLabel,
  factorScoreRequestSchema,
  scoreRequestSchema,
  SCORE_TIERS,
  whatIfRequestSchema,
  type FactorWeights,
} from "../../shared/schema";
import { apiSuccess } from "../../shared/api-contracts";
import { withValidatedBody } from "../middleware/validation";
import { computeFactorScore, computeScoreBreakdown, requireWeights } from "../lib/growth-scoring";
import { explainBreakdown } from "../lib/explanation-generator";
import { FACTOR_FORMULAS } from "../lib/factor-formulas";
import { TIER_CONFIGS } from "../lib/growth-scoring-rubric";
import { whatIf } from "../lib/what-if";
import type { CandidateRoster } from "../lib/candidate-roster";

export interface ScoringRouteOptions {
  roster: CandidateRoster;
  defaultWeights: FactorWeights;
  explanationHighlights: number;
}

export function createScoringRouter(options: ScoringRouteOptions): Router {
  const router = Router();
  const explainOptions = { highlights: options.explanationHighlights };

  const resolveWeights = (weights: Readonly<Record<string, unknown>> | undefined): FactorWeights =>
    weights === undefined ? options.defaultWeights : requireWeights(weights);

  // Formulas, default weights and tier bands the engine is running with
  router.get("/config", (_req: Request, res: Response) => {
    res.json(
      apiSuccess({
        factors: FACTOR_KEYS.map((factor) => ({
          key: factor,
          label: factorLabel(factor),
          description: FACTOR_FORMULAS[factor].description,
          defaultWeight: options.defaultWeights[factor],
          components: FACTOR_FORMULAS[factor].components,
        })),
        defaultWeights: options.defaultWeights,
        tiers: SCORE_TIERS.map((tier) => ({
          tier,
          threshold: TIER_CONFIGS[tier].threshold,
          range: TIER_CONFIGS[tier].range,
        })),
        explanationHighlights: options.explanationHighlights,
      }),
    );
  });

  router.post(
    "/score",
    withValidatedBody(scoreRequestSchema, (body, _req, res) => {
      const weights = resolveWeights(body.weights);
      const breakdown = computeScoreBreakdown(body.metrics, weights);
      res.json(
        apiSuccess({
          breakdown,
          explanation: explainBreakdown(breakdown, weights, explainOptions),
        }),
      );
    }),
  );

  router.post(
    "/factor",
    withValidatedBody(factorScoreRequestSchema, (body, _req, res) => {
      res.json(
        apiSuccess({
          factor: body.factor,
          score: computeFactorScore(body.metrics, body.factor),
        }),
      );
    }),
  );

  router.post(
    "/what-if",
    withValidatedBody(whatIfRequestSchema, (body, _req, res) => {
      const weights = resolveWeights(body.weights);
      const baseMetrics =
        body.candidateId !== undefined
          ? options.roster.getCandidate(body.candidateId).metrics
          : body.metrics ?? {};
      res.json(apiSuccess(whatIf(baseMetrics, body.overrides, weights, explainOptions)));
    }),
  );

  return router;
}
