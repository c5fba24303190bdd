/**
 * Centralized Error Middleware
 * Keeps stack traces and internal messages away from clients
 */

import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

const isProd = process.env.NODE_ENV === 'production';

/**
 * Application Error - Structured error with metadata
 * Use this for all known error cases
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
}

/**
 * Must be registered LAST in the Express app (after all routes)
 */
export function errorMiddleware(
  err: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const appError = err instanceof AppError ? err : undefined;
  const traceId = req.traceId || 'unknown';
  const statusCode = appError?.statusCode ?? statusFromBodyParser(err) ?? 500;
  const code = appError?.code ?? codeForStatus(statusCode);

  let clientMessage: string;
  if (appError?.exposeMessage) {
    clientMessage = err.message;
  } else if (appError || statusCode < 500) {
    clientMessage = getGenericMessage(statusCode);
  } else {
    clientMessage = isProd ? 'Internal server error' : err.message || 'Internal server error';
  }

  const logContext = {
    error: {
      name: err.name,
      message: err.message,
      stack: err.stack,
      code,
      statusCode
    },
    method: req.method,
    path: req.path
  };

  const log = req.log ?? logger.child({ traceId });
  if (statusCode >= 500) {
    log.error(logContext, 'Request error');
  } else {
    log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    error: clientMessage,
    code,
    traceId
  };
  if (appError?.details !== undefined) {
    response.details = appError.details;
  }

  res.status(statusCode).json(response);
}

/**
 * Catch-all for unmatched routes, registered before errorMiddleware
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new AppError(`Route ${req.method} ${req.path} not found`, 404, 'NOT_FOUND', undefined, true));
}

// express.json() failures carry `status` (e.g. 400 bad JSON, 413 too large)
function statusFromBodyParser(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

function codeForStatus(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'VALIDATION_ERROR';
    case 413:
      return 'PAYLOAD_TOO_LARGE';
    default:
      return statusCode >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST';
  }
}

function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 404:
      return 'Not found';
    case 413:
      return 'Payload too large';
    case 500:
      return 'Internal server error';
    case 503:
      return 'Service unavailable';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

/**
 * Helper: Create validation error
 */
export function createValidationError(
  message: string,
  details?: unknown
): AppError {
  return new AppError(
    message,
    400,
    'VALIDATION_ERROR',
    details,
    true
  );
}
