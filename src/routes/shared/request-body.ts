/**
 * Shared request parsing for the host-facing routes.
 */

import type { Context } from 'hono';
import type { z } from 'zod';
import { throwValidationError } from '../../middleware/error-handler.js';

/**
 * Read the JSON body and validate it. A malformed body is a 400; schema
 * failures throw ZodError, which the error handler also maps to 400.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return throwValidationError('Request body must be valid JSON');
  }
  return schema.parse(body);
}

/**
 * Like parseJsonBody, but an empty body validates as `{}`.
 */
export async function parseOptionalJsonBody<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<z.output<S>> {
  const text = await c.req.text();
  if (text.trim() === '') {
    return schema.parse({});
  }
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return throwValidationError('Request body must be valid JSON');
  }
  return schema.parse(body);
}
