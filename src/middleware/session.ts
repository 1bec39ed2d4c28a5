import { randomUUID } from 'node:crypto';
import { getCookie, setCookie } from 'hono/cookie';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types/hono.js';

export const SESSION_COOKIE = 'sid';

const SESSION_ID_RE = /^[A-Za-z0-9_-]{16,128}$/;

export interface SessionCookieOptions {
  secure: boolean;
  maxAgeSeconds: number;
}

/**
 * Resolve the visitor's session id from the `sid` cookie, issuing a new one
 * when it is missing or malformed.
 */
export function sessionCookie(options: SessionCookieOptions) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const existing = getCookie(c, SESSION_COOKIE);
    const sessionId = existing && SESSION_ID_RE.test(existing) ? existing : randomUUID();

    // Re-issued on every request so the cookie slides with the store TTL
    setCookie(c, SESSION_COOKIE, sessionId, {
      httpOnly: true,
      sameSite: 'Lax',
      path: '/',
      secure: options.secure,
      maxAge: options.maxAgeSeconds,
    });

    c.set('sessionId', sessionId);
    await next();
  });
}
