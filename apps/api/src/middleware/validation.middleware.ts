// =====================================================
// Zod Validation Middleware
// =====================================================
// Validates request body or URL params against Zod schemas.
// No invalid data reaches controllers.

import { Request, Response, NextFunction } from 'express';
import { ZodSchema, z } from 'zod';
import { ERROR_CODES } from '@yahrzeit-reminders/shared-types';
import { BadRequestError } from '../utils/errors';

// ===========================================
// Types
// ===========================================

export type ValidatedRequestProperty = 'body' | 'params';

export interface ValidationErrorDetail {
  field: string;
  message: string;
}

// ===========================================
// Middleware Factory
// ===========================================

/**
 * Replaces `req[property]` with the parsed value, so Zod
 * transforms and defaults apply before the handler runs.
 *
 * @example
 * ```typescript
 * router.post('/subjects', validateRequest(createSubjectSchema), createSubject);
 * ```
 */
export function validateRequest<T extends ZodSchema>(
  schema: T,
  property: ValidatedRequestProperty = 'body'
) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      req[property] = parseRequest(schema, req[property]);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Typed parse for values the middleware cannot replace, such
 * as the query string.
 */
export function parseRequest<T extends ZodSchema>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw new BadRequestError(
      `Validation failed: ${errors.map((e) => `${e.field}: ${e.message}`).join('; ')}`,
      ERROR_CODES.VALIDATION_ERROR
    );
  }

  return result.data;
}

// ===========================================
// Helper Functions
// ===========================================

function formatZodErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.errors.map((err) => ({
    field: err.path.join('.') || 'unknown',
    message: err.message,
  }));
}
