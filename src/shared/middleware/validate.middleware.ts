/**
 * Validation Middleware
 * Generic validation using Zod schemas
 */

import type { Request, Response, NextFunction } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';
import { parseOrThrow } from '../utils/validation.util.js';

// ============================================
// TYPES
// ============================================

/**
 * Source of data to validate
 */
export type ValidationSource = 'body' | 'query' | 'params';

// ============================================
// VALIDATION MIDDLEWARE
// ============================================

/**
 * Generic validation middleware using Zod schemas.
 * The parsed body replaces `req.body`; query and params are only checked,
 * handlers parse them again to get typed values.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, source: ValidationSource = 'body') {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      const data = parseOrThrow(schema, req[source], source);
      if (source === 'body') {
        req.body = data;
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Validate query parameters
 */
export function validateQuery<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return validate(schema, 'query');
}
