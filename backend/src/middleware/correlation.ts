import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Middleware that generates or extracts a correlation ID for request tracing.
 * Reconcile runs log it as correlation_id so a report can be traced back.
 */
export function correlationMiddleware(req: Request, res: Response, next: NextFunction): void {
  const existingId = headerValue(req.headers['x-correlation-id'])
    || headerValue(req.headers['x-request-id']);

  const correlationId = existingId || crypto.randomUUID().substring(0, 8);

  req.correlationId = correlationId;
  res.setHeader('X-Correlation-ID', correlationId);

  next();
}
