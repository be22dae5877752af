import type { z } from 'zod';

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: string[] };

/**
 * Run a record schema and return a tagged result instead of throwing.
 * Issues are flattened to `path: message` strings for logging.
 */
export function validateRecord<S extends z.ZodTypeAny>(schema: S, raw: unknown): ParseResult<z.output<S>> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  return {
    ok: false,
    issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}
