/**
 * Validation Utilities
 * Turning Zod failures into API errors
 */

import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { HttpStatus } from '../../config/constants.js';
import { AppError } from '../middleware/error.middleware.js';
import type { FieldIssue } from '../types/index.js';

/**
 * Format Zod issues into field issues
 */
export function formatZodErrors(issues: ZodIssue[], prefix?: string): FieldIssue[] {
  return issues.map((issue) => {
    const path = issue.path.join('.');
    return {
      field: prefix ? [prefix, path].filter(Boolean).join('.') : path,
      message: issue.message,
      code: issue.code,
    };
  });
}

/**
 * Create a user-friendly error message from field issues
 */
export function createErrorMessage(errors: FieldIssue[]): string {
  const [first] = errors;
  if (errors.length === 1 && first) {
    return first.field ? `${first.field}: ${first.message}` : first.message;
  }
  return `Validation failed with ${errors.length} error(s)`;
}

/**
 * Parse `data`, or throw a 422 AppError listing every issue.
 */
export function parseOrThrow<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, prefix?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = formatZodErrors(result.error.issues, prefix);
  throw new AppError(
    createErrorMessage(issues),
    HttpStatus.UNPROCESSABLE_ENTITY,
    'VALIDATION_ERROR',
    true,
    issues
  );
}
