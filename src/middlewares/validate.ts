import { z } from 'zod';
import { ValidationError } from '../errors/appErrors';

/**
 * Parses untrusted input against a schema, raising ValidationError with the
 * first issue on failure.
 */
export function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ValidationError(`${where}${issue.message}`);
  }
  return parsed.data;
}
