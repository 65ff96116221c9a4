// =====================================================
// Request ID Middleware
// =====================================================
// Uses the caller's x-request-id header if present, otherwise
// generates a UUID.

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';
import * as Sentry from '@sentry/node';

declare global {
  namespace Express {
    interface Request {
      id: string;
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-request-id'];
  const requestId = typeof header === 'string' && header.length > 0 ? header : randomUUID();
  req.id = requestId;
  res.setHeader('x-request-id', requestId);

  // Set Sentry scope early so captured errors include request context
  Sentry.getCurrentScope().setContext('request', {
    requestId,
    method: req.method,
    url: req.url,
  });

  next();
}
