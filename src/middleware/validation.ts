import type { z } from 'zod';
import { ValidationError } from '../errors.js';
import { msg, type ErrKey } from '../lib/error-messages.js';

/**
 * Parses request input against a schema. Failures surface as ValidationError,
 * which the server's error handler turns into a 400 with the zod issues.
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, key: ErrKey = 'BAD_INPUT_SCHEMA'): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(msg(key), parsed.error.issues);
  }
  return parsed.data;
}

export function validateBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  return parseWith(schema, body, 'BAD_INPUT_SCHEMA');
}

export function validateParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
  return parseWith(schema, params, 'BAD_PATH_PARAMS');
}
