import type { ZodError, ZodSchema } from 'zod';

/**
 * Individual validation issue.
 */
export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: ValidationIssue[] };

/**
 * Convert Zod errors to our issue format.
 */
export function formatZodErrors(error: ZodError): ValidationIssue[] {
  return error.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Generic validation function for Zod schemas.
 */
export function validate<T>(schema: ZodSchema<T>, data: unknown): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: formatZodErrors(result.error) };
}

export function describeIssues(issues: ValidationIssue[]): string {
  return issues.map(e => `${e.path ? `${e.path}: ` : ''}${e.message}`).join('; ');
}
