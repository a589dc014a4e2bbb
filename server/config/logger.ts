import pino, { type LoggerOptions } from "pino";
import type { Options as HttpLoggerOptions } from "pino-http";
import type { IncomingMessage, ServerResponse } from "http";
import { Environment, parseEnvironment } from "../types/environment";

/**
 * Logger Configuration
 *
 * This module configures Pino logger with appropriate settings for different environments.
 * In development, it uses pino-pretty for human-readable logs.
 * Elsewhere it outputs JSON logs suitable for log aggregation services.
 */

const environment = parseEnvironment(process.env.NODE_ENV);

// Define log levels for different environments
const logLevels: Record<Environment, pino.LevelWithSilent> = {
  [Environment.Development]: "debug",
  [Environment.Test]: "error",
  [Environment.Production]: "info",
};

function resolveLevel(): string {
  const override = process.env.LOG_LEVEL?.trim().toLowerCase();
  return override || logLevels[environment];
}

// Base configuration for all environments
const baseConfig: LoggerOptions = {
  level: resolveLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
};

// Development-specific configuration with pretty printing
const developmentConfig: LoggerOptions = {
  ...baseConfig,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "SYS:standard",
      ignore: "pid,hostname",
    },
  },
};

// Production-specific configuration optimized for log aggregation
const productionConfig: LoggerOptions = {
  ...baseConfig,
  base: {
    env: environment,
    version: process.env.npm_package_version,
    nodeVersion: process.version,
  },
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
};

export const logger = pino(
  environment === Environment.Development ? developmentConfig : productionConfig,
);

// HTTP request logger middleware configuration
export const httpLoggerConfig: HttpLoggerOptions = {
  logger,

  // Customize log level based on response status
  customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
    if (res.statusCode >= 500 || err) {
      return "error";
    } else if (res.statusCode >= 400) {
      return "warn";
    }
    return "info";
  },

  // Skip noisy endpoints in production
  autoLogging: {
    ignore: (req: IncomingMessage) =>
      environment === Environment.Production && req.url === "/api/health",
  },
};
