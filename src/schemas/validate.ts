import type { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

/**
 * Parse untrusted input against a schema
 * @returns The parsed (and transformed) value
 * @throws ValidationError carrying the first issue's message
 */
export const parseInput = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.infer<S> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(issue?.message ?? 'Invalid input');
  }

  return result.data;
};
