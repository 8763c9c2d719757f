import { type AccessToken, NetworkError, ProtocolError } from '@tokenwright/auth';
import { logEvent } from '@tokenwright/core';
import { readSessionId } from './session-cookie.js';
import type { OAuthClientHandler } from './types.js';

export const CallbackHandler: OAuthClientHandler = async (c) => {
  const pendingStates = c.get('pendingStates');
  const state = c.req.query('state');

  const oauthError = c.req.query('error');
  if (oauthError) {
    if (state) {
      pendingStates.consume(state);
    }
    logEvent('warn', 'server:authorization_denied', { oauthError });
    return c.json(
      { error: oauthError, error_description: c.req.query('error_description') ?? null },
      400,
    );
  }

  const code = c.req.query('code');
  if (!code || !state) {
    return c.json(
      { error: 'invalid_request', error_description: 'Missing code or state parameter' },
      400,
    );
  }

  // Consumed before the session check so a leaked state cannot be retried
  const pending = pendingStates.consume(state);
  const sessionId = readSessionId(c);
  if (!pending || pending.sessionId !== sessionId) {
    logEvent('warn', 'server:invalid_state', { sessionId });
    return c.json(
      { error: 'invalid_state', error_description: 'Unknown, expired or mismatched state' },
      400,
    );
  }

  let token: AccessToken;
  try {
    token = await c.get('exchanger').exchangeCode(code, { sessionId: pending.sessionId });
  } catch (error) {
    if (error instanceof NetworkError || error instanceof ProtocolError) {
      return c.json({ error: 'token_exchange_failed', error_description: error.message }, 502);
    }
    throw error;
  }

  c.get('registry').register(pending.sessionId, token);

  return c.json({
    authenticated: true,
    expiresAt: token.expiresAt?.toISOString() ?? null,
    scope: token.scope ?? null,
  });
};
