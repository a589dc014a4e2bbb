import express, { type Express } from "express";
import cors from "cors";
import helmet from "helmet";
import pinoHttp from "pino-http";
import { httpLoggerConfig } from "./config/logger";
import { config, type AppConfig } from "./config/unified-config";
import { Environment } from "./types/environment";
import { registerRoutes } from "./routes";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { CandidateRoster, loadCandidateRoster } from "./lib/candidate-roster";

export interface AppOptions {
  config?: AppConfig;
  /** Defaults to the roster named by the configuration */
  roster?: CandidateRoster;
}

/**
 * Build the Express application without binding a port
 */
export function createApp(options: AppOptions = {}): Express {
  const appConfig = options.config ?? config;
  const explanationHighlights = appConfig.scoring.explanationHighlights;
  const roster =
    options.roster ??
    new CandidateRoster(loadCandidateRoster(appConfig.scoring.rosterPath), {
      highlights: explanationHighlights,
    });

  const app = express();

  app.use(helmet());

  // Apply CORS to all API routes (handles OPTIONS automatically)
  app.use(
    "/api",
    cors({
      origin: appConfig.env === Environment.Development ? true : appConfig.security.corsOrigins,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Accept", "Origin"],
      optionsSuccessStatus: 200, // Some legacy browsers choke on 204
      maxAge: 86400,
    }),
  );

  app.use(pinoHttp(httpLoggerConfig));
  app.use(express.json({ limit: "100kb" }));

  registerRoutes(app, {
    roster,
    defaultWeights: appConfig.scoring.defaultWeights,
    explanationHighlights,
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
