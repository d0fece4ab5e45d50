import { z } from 'zod';

export type BodyValidation<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validates a request body against a Zod schema. Failures come back as one
 * readable line suitable for a 400 response.
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T, body: unknown): BodyValidation<z.infer<T>> {
  const result = schema.safeParse(body);
  if (!result.success) {
    return { ok: false, error: formatIssues(result.error.issues) };
  }
  return { ok: true, data: result.data };
}
