/**
 * Request Validation Middleware
 * Provides request body and query validation using Zod schemas
 */

import type { z } from "zod";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import { logger } from "../config/logger";
import { AppValidationError } from "../../shared/errors";

/**
 * Validate input against a Zod schema, throwing AppValidationError
 */
export function validateRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((err) => ({
      path: err.path.join("."),
      message: err.message,
    }));
    const errorMessage = issues
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join(", ");
    throw new AppValidationError(
      `Validation failed: ${errorMessage}`,
      issues[0]?.path || undefined,
      ["schema"],
      { issues },
    );
  }
  return result.data;
}

/**
 * Wrap a route handler so it receives the validated, typed request body.
 * Validation failures are passed to the error middleware.
 */
export function withValidatedBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: (body: T, req: Request, res: Response) => void,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    let body: T;
    try {
      body = validateRequest(schema, req.body);
    } catch (error) {
      logger.debug(
        {
          error: error instanceof Error ? error.message : "Unknown error",
          endpoint: req.path,
        },
        "Request validation failed",
      );
      next(error);
      return;
    }

    try {
      handler(body, req, res);
    } catch (error) {
      next(error);
    }
  };
}
