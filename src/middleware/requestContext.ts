import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import { withRequestId } from '../lib/logger.js';
import type { AppEnv } from '../types/hono.js';

const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Assign a request id (upstream header or a new UUID), attach a child logger
 * and log one line per request.
 */
export const requestContext = createMiddleware<AppEnv>(async (c, next) => {
  const incoming = c.req.header(REQUEST_ID_HEADER)?.trim();
  const requestId = incoming || randomUUID();
  const log = withRequestId(requestId);
  const started = Date.now();

  c.set('requestId', requestId);
  c.set('log', log);

  await next();

  c.header(REQUEST_ID_HEADER, requestId);
  log.info('request', {
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    durationMs: Date.now() - started,
  });
});
