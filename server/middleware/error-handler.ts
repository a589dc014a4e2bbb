/**
 * RESULT PATTERN: Centralized Error Handling Middleware
 * Provides consistent error responses across all endpoints
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger';
import { BaseAppError, AppNotFoundError, toAppError } from '../../shared/errors';
import type { ApiError } from '../../shared/api-contracts';

function toResponseBody(error: BaseAppError): ApiError {
  return {
    success: false,
    error: error.code,
    message: error.message,
    timestamp: error.timestamp,
    ...(error.details && { details: error.details })
  };
}

/**
 * Express error handling middleware for Result pattern errors
 */
export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  // Skip if response already sent
  if (res.headersSent) {
    next(err);
    return;
  }

  // Convert unknown errors to AppError
  const appError = err instanceof BaseAppError ? err : toAppError(err, `${req.method} ${req.path}`);

  const context = {
    error: appError.code,
    statusCode: appError.statusCode,
    path: req.path,
    method: req.method,
    details: appError.details
  };

  if (appError.statusCode >= 500) {
    logger.error({ ...context, stack: err instanceof Error ? err.stack : undefined }, appError.message);
  } else {
    logger.warn(context, appError.message);
  }

  res.status(appError.statusCode).json(toResponseBody(appError));
};

/**
 * Catch-all middleware for unhandled routes
 */
export const notFoundHandler = (req: Request, res: Response): void => {
  const error = AppNotFoundError.resourceNotFound(`Route ${req.method} ${req.path}`);

  logger.warn({ path: req.path, method: req.method }, 'Route not found');

  res.status(error.statusCode).json(toResponseBody(error));
};
