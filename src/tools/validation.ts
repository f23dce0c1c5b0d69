/**
 * Tool argument validation
 * Validates tool arguments using Zod schemas
 */

import type { ZodType, ZodTypeDef } from 'zod';

export type ValidationResult<T> = { success: true; data: T } | { success: false; errors: ValidationError[] };

export interface ValidationError {
  path: string;
  message: string;
}

/**
 * Validate tool arguments against schema
 */
export function validateToolArgs<T>(schema: ZodType<T, ZodTypeDef, unknown>, args: unknown): ValidationResult<T> {
  const result = schema.safeParse(args);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}

/**
 * Format validation errors for user
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  if (errors.length === 0) {
    return 'No validation errors';
  }

  const formatted = errors.map((err) => (err.path ? `${err.path}: ${err.message}` : err.message));

  return `Validation errors:\n${formatted.join('\n')}`;
}
