/**
 * Error handling middleware - provides centralized error handling for the API.
 * Maps ApiError and AppError onto HTTP statuses, formats error responses,
 * and handles structured logging of server-side errors.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../../shared/config';
import { AppError, ErrorCategory } from '../../shared/errors';
import { loggers, serializeError } from '../../shared/logging';

/**
 * Custom error class for API errors with status codes
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public code?: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const CATEGORY_STATUS: Partial<Record<ErrorCategory, number>> = {
  [ErrorCategory.VALIDATION]: 400,
  [ErrorCategory.NOT_FOUND]: 404
};

/**
 * HTTP status for an error reaching the handler
 */
export function statusForError(err: Error): number {
  if (err instanceof ApiError) {
    return err.statusCode;
  }
  if (err instanceof AppError) {
    return CATEGORY_STATUS[err.category] ?? 500;
  }
  // body-parser and other http-errors style errors carry their own status
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

/**
 * Centralized error handler middleware
 * Logs errors with full context and returns appropriate responses
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  const statusCode = statusForError(err);
  const isServerError = statusCode >= 500;
  const message = err instanceof AppError ? err.userMessage : err.message;

  const errorContext = {
    err: serializeError(err),
    requestId: req.id,
    method: req.method,
    path: req.path,
    statusCode,
    ...(err instanceof ApiError && err.code && { errorCode: err.code }),
    ...(err instanceof AppError && { category: err.category }),
  };

  if (isServerError) {
    loggers.api.error(errorContext, `Request failed: ${err.message}`);
  } else {
    loggers.api.warn(errorContext, `Client error: ${message}`);
  }

  const response: Record<string, unknown> = {
    success: false,
    error: isServerError ? 'Internal Server Error' : message,
  };

  if (config.server.isDevelopment) {
    response.message = err.message;
    response.stack = err.stack;
  }

  if (err instanceof ApiError && err.code) {
    response.code = err.code;
  }
  if (err instanceof AppError) {
    response.code = err.category;
    if (!isServerError && err.context?.errors) {
      response.details = err.context.errors;
    }
    if (!isServerError && err.suggestedAction) {
      response.suggestedAction = err.suggestedAction;
    }
  }

  res.status(statusCode).json(response);
};

/**
 * Async handler wrapper to catch errors in async route handlers
 * Forwards errors to the error handling middleware
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

/**
 * 404 for unmatched /api routes
 */
export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(new ApiError(404, `Route not found: ${req.method} ${req.path}`, 'ROUTE_NOT_FOUND'));
};
