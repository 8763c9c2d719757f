import type { Context } from 'hono';
import { logEvent } from '@tokenwright/core';
import { clearSessionCookie, readSessionId } from './session-cookie.js';
import type { OAuthClientEnv, OAuthClientHandler } from './types.js';

async function deleteStoredRecords(c: Context<OAuthClientEnv>, sessionIds: string[]): Promise<void> {
  const store = c.get('tokenStore');
  if (!store) return;
  await Promise.all(sessionIds.map((sessionId) => store.delete(sessionId)));
}

/**
 * Token status of the caller's session; never includes token material.
 * Sessions whose token expired without a way to refresh are dropped here.
 */
export const GetSessionHandler: OAuthClientHandler = async (c) => {
  const pruned = c.get('registry').prune();
  if (pruned.length > 0) {
    await deleteStoredRecords(c, pruned);
    logEvent('info', 'server:sessions_expired', { count: pruned.length });
  }

  const sessionId = readSessionId(c);
  const token = sessionId ? c.get('registry').get(sessionId) : undefined;
  if (!token) {
    return c.json({ authenticated: false });
  }

  return c.json({
    authenticated: true,
    state: token.state(),
    expiresAt: token.expiresAt?.toISOString() ?? null,
    scope: token.scope ?? null,
    tokenType: token.tokenType ?? null,
    canRefresh: token.canRefresh(),
  });
};

export const LogoutHandler: OAuthClientHandler = async (c) => {
  const sessionId = readSessionId(c);
  let loggedOut = false;
  if (sessionId) {
    loggedOut = c.get('registry').remove(sessionId);
    await deleteStoredRecords(c, [sessionId]);
  }
  clearSessionCookie(c);
  return c.json({ loggedOut });
};
