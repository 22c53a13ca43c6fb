import { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import { RESERVED_WORKSPACE_NAMES } from '../types/workspace.js';
import { describeIssues, validate } from '../utils/validation.js';

export const workspaceNameSchema = z
  .string()
  .min(1, 'Workspace name is required')
  .max(50, 'Workspace name must be at most 50 characters')
  .regex(
    /^[a-zA-Z0-9_-]+$/,
    'Workspace name may only contain letters, digits, hyphens and underscores'
  )
  .refine(name => !RESERVED_WORKSPACE_NAMES.includes(name.toLowerCase()), {
    message: `Workspace name is reserved (${RESERVED_WORKSPACE_NAMES.join(', ')})`,
  });

export function isValidWorkspaceName(name: string): boolean {
  return validate(workspaceNameSchema, name).success;
}

/**
 * Returns the name unchanged or throws a ValidationError.
 */
export function assertWorkspaceName(name: string, field = 'workspace'): string {
  const result = validate(workspaceNameSchema, name);
  if (!result.success) {
    throw new ValidationError(`Invalid workspace name '${name}': ${describeIssues(result.errors)}`, field);
  }
  return result.data;
}
