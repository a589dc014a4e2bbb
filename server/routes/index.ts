/**
 * Modular Routes Index
 * Consolidates all route modules into a single registration system
 */

import type { Express } from "express";
import type { FactorWeights } from "../../shared/schema";
import { API_BASE } from "../../shared/api-contracts";
import type { CandidateRoster } from "../lib/candidate-roster";
import healthRoutes from "./health";
import { createScoringRouter } from "./scoring";
import { createCandidateRouter } from "./candidates";

export interface RouteDependencies {
  roster: CandidateRoster;
  defaultWeights: FactorWeights;
  explanationHighlights: number;
}

/**
 * Register all API routes with the Express app
 */
export function registerRoutes(app: Express, deps: RouteDependencies): void {
  // Health and system monitoring routes
  app.use(API_BASE, healthRoutes);

  // Stateless scoring over request-supplied metrics
  app.use(`${API_BASE}/scoring`, createScoringRouter(deps));

  // Roster ranking, comparison and detail
  app.use(`${API_BASE}/candidates`, createCandidateRouter(deps));
}
