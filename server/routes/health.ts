/**
 * Health Routes
 * Liveness check for load balancers and uptime monitors
 */

import { Router, Request, Response } from "express";
import { apiSuccess, type HealthResponse } from "../../shared/api-contracts";

const router = Router();

// Basic health check endpoint - Fast response for load balancers
router.get("/health", (_req: Request, res: Response) => {
  const health: HealthResponse = {
    status: "ok",
    timestamp: new Date().toISOString(),
    uptime: Math.round(process.uptime()),
  };
  res.json(apiSuccess(health));
});

export default router;
