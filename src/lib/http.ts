import type { Context } from 'hono';
import type { AppEnv } from '../types/hono.js';
import { StoreError, ValidationError, toErrorResponse } from './errors.js';
import { errorMeta } from './logger.js';

/**
 * JSON error response with the error's status code.
 * Anything that is not a StoreError is logged and answered with a generic 500.
 */
export function jsonError(c: Context<AppEnv>, error: unknown) {
  if (error instanceof StoreError) {
    return c.json(toErrorResponse(error), error.statusCode);
  }

  c.var.log.error('unhandled error', { path: c.req.path, ...errorMeta(error) });
  return c.json(toErrorResponse(error), 500);
}

/**
 * Parse a JSON request body; an empty or invalid body is a validation error
 */
export async function readJson(c: Context<AppEnv>): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}
