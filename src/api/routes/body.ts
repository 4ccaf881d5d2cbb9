import type { Context } from 'hono';
import type { z } from 'zod';
import { RelayError } from '../../shared/errors.js';

export class BadRequestError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'BAD_REQUEST', details);
    this.name = 'BadRequestError';
  }
}

/**
 * Parse and validate a JSON body; a missing or malformed body is validated as `{}`.
 */
export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  const raw: unknown = await c.req.json().catch(() => ({}));
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new BadRequestError('Invalid request body', {
      errors: result.error.flatten().fieldErrors,
    });
  }
  return result.data;
}
