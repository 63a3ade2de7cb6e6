import { z } from 'zod';
import { ValidationError } from '../errors';

export function parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw ValidationError.fromZod(result.error);
  return result.data;
}

export const id = z.string().uuid();

/** ISO-8601 timestamp with offset, or a plain `YYYY-MM-DD` date (midnight UTC). */
export const isoDate = z
  .union([z.string().datetime({ offset: true }), z.string().date()])
  .transform((value) => new Date(value));

export const queryBoolean = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const pagination = {
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(100)
};
