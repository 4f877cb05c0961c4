/**
 * backend/src/shared/http/validation.ts
 *
 * WHY:
 * - Every controller validates its input with zod the same way.
 * - Validation failures become AppError(VALIDATION_ERROR) so the error handler
 *   renders the 422 envelope consistently.
 *
 * RULES:
 * - HTTP-only helper. No DB, no services.
 */

import type { z } from 'zod';
import { AppError } from './errors';

export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(formatIssues(parsed.error.issues), {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
