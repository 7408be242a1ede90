import { Request, Response, NextFunction } from 'express';
import { ReconcileError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
}

export function createError(message: string, statusCode = 500, code = 'INTERNAL_ERROR'): AppError {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  return error;
}

/**
 * Status for reconciliation errors that escape a route. Only LoadError
 * normally does: the catalog is unavailable, so the batch was not attempted.
 */
function reconcileStatus(error: ReconcileError): number {
  switch (error.code) {
    case 'LOAD_FAILED':
      return 503;
    case 'CONFLICT':
      return 409;
    case 'RECORD_FAILED':
      return 422;
  }
}

export function errorHandler(err: AppError, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    return next(err);
  }

  const statusCode = err instanceof ReconcileError ? reconcileStatus(err) : err.statusCode || 500;
  const code = err.code || 'INTERNAL_ERROR';

  if (statusCode >= 500) {
    logger.error(err.message, {
      correlation_id: req.correlationId,
      code,
      path: req.originalUrl,
    });
  }

  res.status(statusCode).json({
    success: false,
    error: {
      message: err.message,
      code,
    },
  });
}
