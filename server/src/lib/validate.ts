import type { z } from 'zod';

export type BodyValidation<T> =
  | { success: true; data: T }
  | { success: false; error: string; issues: z.ZodIssue[] };

/**
 * Validates a request body against a zod schema. On failure `error` is a
 * one-line summary suitable for an API response.
 */
export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown,
): BodyValidation<T> {
  const result = schema.safeParse(body);
  if (result.success) return { success: true, data: result.data };
  const error = result.error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return { success: false, error, issues: result.error.issues };
}
