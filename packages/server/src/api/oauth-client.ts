import { Hono } from 'hono';
import { AuthenticationError, SessionTokenRegistry, type TokenExchanger } from '@tokenwright/auth';
import { type ITokenStore, logError } from '@tokenwright/core';
import { PendingStateStore } from '../oauth/pending-state-store.js';
import { AuthorizeHandler } from './oauth-client/authorize.js';
import { CallbackHandler } from './oauth-client/callback.js';
import { GetSessionHandler, LogoutHandler } from './oauth-client/session.js';
import type { OAuthClientEnv, SessionCookieOptions } from './oauth-client/types.js';

export const DEFAULT_SESSION_COOKIE: SessionCookieOptions = {
  name: 'tokenwright_session',
  secure: false,
  maxAgeSeconds: 24 * 60 * 60,
};

export interface OAuthClientRouteOptions {
  /** Exchanger of the client profile to authorize against */
  exchanger: TokenExchanger;
  /** Session → token map; a new one is created when omitted */
  registry?: SessionTokenRegistry;
  /**
   * Store the auto-save hook writes to; records are deleted on logout and when
   * a session's token has expired for good
   */
  tokenStore?: ITokenStore;
  pendingStates?: PendingStateStore;
  sessionCookie?: Partial<SessionCookieOptions>;
}

/**
 * Hono route driving the authorization code flow for browser sessions.
 *
 * - GET /authorize: 307 to the authorization server
 * - GET /callback: state check, code exchange, session registration
 * - GET /session: token status of the current session; expired tokens that
 *   cannot refresh are dropped first
 * - POST /logout: forget the session's token and its stored record
 * @example
 * ```typescript
 * const app = new Hono();
 * app.route('/oauth', createOAuthClientRoute({ exchanger }));
 * ```
 * @public
 */
export function createOAuthClientRoute(options: OAuthClientRouteOptions): Hono<OAuthClientEnv> {
  const registry = options.registry ?? new SessionTokenRegistry();
  const pendingStates = options.pendingStates ?? new PendingStateStore();
  const sessionCookie: SessionCookieOptions = { ...DEFAULT_SESSION_COOKIE, ...options.sessionCookie };

  const route = new Hono<OAuthClientEnv>();

  route.use('*', async (c, next) => {
    c.set('exchanger', options.exchanger);
    c.set('registry', registry);
    c.set('tokenStore', options.tokenStore);
    c.set('pendingStates', pendingStates);
    c.set('sessionCookie', sessionCookie);
    await next();
  });

  route.get('/authorize', AuthorizeHandler);
  route.get('/callback', CallbackHandler);
  route.get('/session', GetSessionHandler);
  route.post('/logout', LogoutHandler);

  route.onError((error, c) => {
    logError('server:oauth-client', error, { path: c.req.path });
    if (error instanceof AuthenticationError) {
      return c.json({ error: error.code, error_description: error.message }, 500);
    }
    return c.json({ error: 'server_error', error_description: 'Internal server error' }, 500);
  });

  return route;
}
