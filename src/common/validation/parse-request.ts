import type { z } from 'zod';
import { ValidationError } from '../errors/scheduling.errors.js';

/** Runs a zod schema over a request body or query, as a ValidationError on failure. */
export function parseRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid request', parsed.error.flatten());
  }
  return parsed.data;
}
