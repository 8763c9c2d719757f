import { buildAuthorizeRedirect } from '@tokenwright/auth';
import { logEvent } from '@tokenwright/core';
import { ensureSessionId } from './session-cookie.js';
import type { OAuthClientHandler } from './types.js';

/**
 * Sends the resource owner to the authorization server with a fresh state
 * bound to their session.
 */
export const AuthorizeHandler: OAuthClientHandler = (c) => {
  const sessionId = ensureSessionId(c);
  const state = c.get('pendingStates').create(sessionId);

  const redirect = buildAuthorizeRedirect(c.get('exchanger').profile, {
    state,
    scope: c.req.query('scope') || undefined,
  });

  logEvent('info', 'server:authorize_redirect', { sessionId });
  return c.redirect(redirect.headers.Location, redirect.status);
};
