import type { Context } from 'hono';
import { deleteCookie, getCookie, setCookie } from 'hono/cookie';
import { RequestUtils } from '@tokenwright/core';
import type { OAuthClientEnv } from './types.js';

export function readSessionId(c: Context<OAuthClientEnv>): string | undefined {
  return getCookie(c, c.get('sessionCookie').name) || undefined;
}

/**
 * Returns the caller's session id, issuing a new session cookie when there is none.
 */
export function ensureSessionId(c: Context<OAuthClientEnv>): string {
  const existing = readSessionId(c);
  if (existing) {
    return existing;
  }

  const { name, secure, maxAgeSeconds } = c.get('sessionCookie');
  const sessionId = RequestUtils.generateSessionId();
  setCookie(c, name, sessionId, {
    httpOnly: true,
    sameSite: 'Lax',
    path: '/',
    secure,
    maxAge: maxAgeSeconds,
  });
  return sessionId;
}

export function clearSessionCookie(c: Context<OAuthClientEnv>): void {
  deleteCookie(c, c.get('sessionCookie').name, { path: '/' });
}
