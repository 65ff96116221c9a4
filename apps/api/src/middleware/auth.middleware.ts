// =====================================================
// Service Authentication Middleware
// =====================================================
// The hook endpoints are called by the record-management
// component only. It signs a short-lived HS256 JWT with the
// shared service secret; the subject claim names the caller.

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { ERROR_CODES } from '@yahrzeit-reminders/shared-types';
import { UnauthorizedError } from '../utils/errors';

// ===========================================
// Type Extensions
// ===========================================

declare global {
  namespace Express {
    interface Request {
      serviceCaller?: string;
    }
  }
}

export interface ServiceTokenOptions {
  secret: string;
  issuer: string;
}

// ===========================================
// Middleware Functions
// ===========================================

function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const parts = authHeader.split(' ');

  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }

  return parts[1];
}

/**
 * Verifies the service token and records the caller.
 * Returns 401 for a missing, expired or foreign token.
 */
export function verifyServiceToken(token: string, options: ServiceTokenOptions): string {
  let payload: string | jwt.JwtPayload;
  try {
    payload = jwt.verify(token, options.secret, {
      algorithms: ['HS256'],
      issuer: options.issuer,
    });
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      throw new UnauthorizedError('Service token expired', ERROR_CODES.TOKEN_EXPIRED);
    }
    throw new UnauthorizedError('Invalid service token', ERROR_CODES.TOKEN_INVALID);
  }

  if (typeof payload === 'string') {
    throw new UnauthorizedError('Invalid service token', ERROR_CODES.TOKEN_INVALID);
  }

  return payload.sub ?? options.issuer;
}

export function requireServiceToken(options: ServiceTokenOptions) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      const token = extractBearerToken(req.headers.authorization);

      if (!token) {
        throw new UnauthorizedError('Authentication required', ERROR_CODES.TOKEN_INVALID);
      }

      req.serviceCaller = verifyServiceToken(token, options);
      next();
    } catch (error) {
      next(error);
    }
  };
}
