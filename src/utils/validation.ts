/**
 * Shared validation utilities for tool input and environment settings.
 */

import type { ZodError } from 'zod';

/**
 * Format Zod validation errors into a readable string.
 *
 * @param error - A failed safeParse error
 * @returns Issues as "path: message", joined with "; "
 */
export function formatZodError(error: ZodError): string {
  if (error.issues.length === 0) {
    return 'Validation error';
  }
  return error.issues
    .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
    .join('; ');
}
