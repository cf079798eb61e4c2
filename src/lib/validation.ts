import type { z } from 'zod';
import { ValidationError } from './errors';

/**
 * Parses `value` with `schema`, turning zod issues into a ValidationError
 * whose message is the first issue.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, subject: string): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const first = issues[0];
  const where = first && first.path ? ` (${first.path})` : '';

  throw new ValidationError(`Invalid ${subject}: ${first?.message ?? 'unknown issue'}${where}`, { issues });
}
