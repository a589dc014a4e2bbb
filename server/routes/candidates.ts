/**
 * Candidate Routes
 * Ranking, comparison, trajectories and per-candidate detail over the roster
 */

import { Router, Request, Response } from "express";
import { weightsQuerySchema, type FactorWeights } from "../../shared/schema";
import { apiSuccess } from "../../shared/api-contracts";
import { unwrapResult } from "../../shared/result-types";
import { validateRequest } from "../middleware/validation";
import { parseFactorWeights } from "../lib/scoring-weights";
import { analyzeTrajectory } from "../lib/career-trajectory";
import type { CandidateRoster } from "../lib/candidate-roster";

export interface CandidateRouteOptions {
  roster: CandidateRoster;
  defaultWeights: FactorWeights;
}

export function createCandidateRouter(options: CandidateRouteOptions): Router {
  const router = Router();
  const { roster } = options;

  // ?weights=30,25,20,15,10 in canonical factor order
  const weightsFromQuery = (req: Request): FactorWeights => {
    const { weights } = validateRequest(weightsQuerySchema, req.query);
    return weights === undefined ? options.defaultWeights : unwrapResult(parseFactorWeights(weights));
  };

  router.get("/", (req: Request, res: Response) => {
    const weights = weightsFromQuery(req);
    res.json(
      apiSuccess({
        ranking: roster.rankCandidates(weights),
        summary: roster.summarizeRoster(weights),
        weights,
      }),
    );
  });

  // Registered before /:id so "compare" and "trajectories" are not read as ids
  router.get("/compare", (req: Request, res: Response) => {
    res.json(apiSuccess(roster.compareCandidates(weightsFromQuery(req))));
  });

  router.get("/trajectories", (_req: Request, res: Response) => {
    res.json(apiSuccess({ trajectories: roster.compareTrajectories() }));
  });

  router.get("/:id", (req: Request, res: Response) => {
    const scored = roster.scoreCandidate(req.params.id, weightsFromQuery(req));
    res.json(
      apiSuccess({
        ...scored,
        trajectory: analyzeTrajectory(scored.candidate),
      }),
    );
  });

  return router;
}
