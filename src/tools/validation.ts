/**
 * Tool input validation
 */

import type { z } from 'zod';
import { ToolError } from '../errors/types.js';

/**
 * Validate model-supplied tool input, throwing ToolError on a mismatch
 */
export function parseToolInput<T extends z.ZodTypeAny>(
  schema: T,
  input: Record<string, unknown>,
  toolName: string
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.') || 'input'}: ${e.message}`);
    throw new ToolError(`Invalid input for ${toolName}: ${issues.join('; ')}`, 'invalid_params', toolName);
  }
  return result.data;
}
