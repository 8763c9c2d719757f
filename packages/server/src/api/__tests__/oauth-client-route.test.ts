import { describe, it, expect, beforeEach } from 'vitest';
import { Hono } from 'hono';
import {
  ClientProfile,
  type ClientProfileConfig,
  MemoryTokenStore,
  SessionTokenRegistry,
  TokenExchanger,
  createAutoSaveHook,
} from '@tokenwright/auth';
import { FetchHttpTransport } from '@tokenwright/core';
import { createOAuthClientRoute } from '../oauth-client.js';
import type { OAuthClientEnv } from '../oauth-client/types.js';
import { createClientApp } from '../../index.js';

/**
 * In-process authorization server token endpoint
 */
function createTokenEndpoint(): { app: Hono; received: URLSearchParams[] } {
  const app = new Hono();
  const received: URLSearchParams[] = [];

  app.post('/oauth/token', async (c) => {
    const form = new URLSearchParams(await c.req.text());
    received.push(form);

    if (form.get('code') === 'good-code') {
      return c.json({
        access_token: 'access-1',
        token_type: 'Bearer',
        expires_in: 3600,
        refresh_token: 'refresh-1',
        scope: 'read',
      });
    }
    if (form.get('code') === 'short-code') {
      return c.json({ access_token: 'access-2', token_type: 'Bearer', expires_in: 0 });
    }
    return c.json({ error: 'invalid_grant', error_description: 'Unknown code' }, 400);
  });

  return { app, received };
}

function setup(profileOverrides: Partial<ClientProfileConfig> = {}) {
  const tokenEndpoint = createTokenEndpoint();
  const store = new MemoryTokenStore();
  const profile = new ClientProfile({
    autoSave: createAutoSaveHook(store),
    clientId: 'test-client',
    clientSecret: 'test-secret',
    site: 'https://auth.example.com',
    redirectUri: 'https://app.example.com/oauth/callback',
    ...profileOverrides,
  });
  const transport = new FetchHttpTransport({
    fetch: async (input, init) => tokenEndpoint.app.request(input, init),
  });
  const exchanger = new TokenExchanger(profile, { transport });
  const registry = new SessionTokenRegistry();
  const route = createOAuthClientRoute({ exchanger, registry, tokenStore: store });
  return { route, registry, store, received: tokenEndpoint.received };
}

/**
 * Runs GET /authorize and returns the issued state and session cookie
 */
async function startAuthorization(route: Hono<OAuthClientEnv>) {
  const response = await route.request('/authorize');
  const location = new URL(response.headers.get('location') ?? '');
  const cookie = (response.headers.get('set-cookie') ?? '').split(';')[0] ?? '';
  return { response, location, state: location.searchParams.get('state') ?? '', cookie };
}

describe('OAuth client route', () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  describe('GET /authorize', () => {
    it('should redirect to the authorization endpoint with a state', async () => {
      const { response, location, state } = await startAuthorization(ctx.route);

      expect(response.status).toBe(307);
      expect(location.origin + location.pathname).toBe('https://auth.example.com/oauth/authorize');
      expect(location.searchParams.get('response_type')).toBe('code');
      expect(location.searchParams.get('client_id')).toBe('test-client');
      expect(location.searchParams.get('redirect_uri')).toBe('https://app.example.com/oauth/callback');
      expect(location.searchParams.has('client_secret')).toBe(false);
      expect(state).toMatch(/^[A-Za-z0-9_-]{22}$/);
    });

    it('should issue an http-only session cookie', async () => {
      const response = await ctx.route.request('/authorize');
      const setCookie = response.headers.get('set-cookie') ?? '';

      expect(setCookie).toMatch(/^tokenwright_session=[0-9a-f-]{36};/);
      expect(setCookie).toContain('HttpOnly');
      expect(setCookie).toContain('SameSite=Lax');
    });

    it('should keep an existing session and forward the scope', async () => {
      const response = await ctx.route.request('/authorize?scope=read%20write', {
        headers: { Cookie: 'tokenwright_session=session-1' },
      });
      const location = new URL(response.headers.get('location') ?? '');

      expect(response.headers.get('set-cookie')).toBeNull();
      expect(location.searchParams.get('scope')).toBe('read write');
    });
  });

  describe('GET /callback', () => {
    it('should exchange the code and register the session token', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);

      const response = await ctx.route.request(`/callback?code=good-code&state=${state}`, {
        headers: { Cookie: cookie },
      });

      expect(response.status).toBe(200);
      await expect(response.json()).resolves.toMatchObject({ authenticated: true, scope: 'read' });
      expect(ctx.registry.size).toBe(1);
      expect(ctx.received).toHaveLength(1);
      expect(ctx.received[0]?.get('grant_type')).toBe('authorization_code');
      expect(ctx.received[0]?.get('client_secret')).toBe('test-secret');
      expect(ctx.received[0]?.get('redirect_uri')).toBe('https://app.example.com/oauth/callback');
    });

    it('should refuse a state that was already used', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);
      const url = `/callback?code=good-code&state=${state}`;

      await ctx.route.request(url, { headers: { Cookie: cookie } });
      const replay = await ctx.route.request(url, { headers: { Cookie: cookie } });

      expect(replay.status).toBe(400);
      await expect(replay.json()).resolves.toMatchObject({ error: 'invalid_state' });
      expect(ctx.received).toHaveLength(1);
    });

    it('should refuse a state issued to another session', async () => {
      const { state } = await startAuthorization(ctx.route);

      const response = await ctx.route.request(`/callback?code=good-code&state=${state}`, {
        headers: { Cookie: 'tokenwright_session=someone-else' },
      });

      expect(response.status).toBe(400);
      expect(ctx.received).toHaveLength(0);
    });

    it('should require code and state', async () => {
      const response = await ctx.route.request('/callback?code=good-code');

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        error: 'invalid_request',
        error_description: 'Missing code or state parameter',
      });
    });

    it('should forward an authorization error', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);

      const response = await ctx.route.request(
        `/callback?error=access_denied&error_description=User%20declined&state=${state}`,
        { headers: { Cookie: cookie } },
      );

      expect(response.status).toBe(400);
      await expect(response.json()).resolves.toEqual({
        error: 'access_denied',
        error_description: 'User declined',
      });
    });

    it('should answer 502 when the token endpoint rejects the code', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);

      const response = await ctx.route.request(`/callback?code=bad-code&state=${state}`, {
        headers: { Cookie: cookie },
      });

      expect(response.status).toBe(502);
      await expect(response.json()).resolves.toEqual({
        error: 'token_exchange_failed',
        error_description: 'Token endpoint returned HTTP 400: invalid_grant (Unknown code)',
      });
      expect(ctx.registry.size).toBe(0);
    });

    it('should answer 500 when the token cannot be saved', async () => {
      const failing = setup({
        autoSave: () => {
          throw new Error('store offline');
        },
      });
      const { state, cookie } = await startAuthorization(failing.route);

      const response = await failing.route.request(`/callback?code=good-code&state=${state}`, {
        headers: { Cookie: cookie },
      });

      expect(response.status).toBe(500);
      await expect(response.json()).resolves.toMatchObject({ error: 'auto_save_failed' });
      expect(failing.registry.size).toBe(0);
    });
  });

  describe('session lifecycle', () => {
    it('should report, then forget, the session token', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);
      await ctx.route.request(`/callback?code=good-code&state=${state}`, {
        headers: { Cookie: cookie },
      });

      const session = await ctx.route.request('/session', { headers: { Cookie: cookie } });
      await expect(session.json()).resolves.toMatchObject({
        authenticated: true,
        state: 'fresh',
        tokenType: 'Bearer',
        canRefresh: true,
      });

      const logout = await ctx.route.request('/logout', {
        method: 'POST',
        headers: { Cookie: cookie },
      });
      await expect(logout.json()).resolves.toEqual({ loggedOut: true });

      const after = await ctx.route.request('/session', { headers: { Cookie: cookie } });
      await expect(after.json()).resolves.toEqual({ authenticated: false });
    });

    it('should delete the stored record on logout', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);
      await ctx.route.request(`/callback?code=good-code&state=${state}`, {
        headers: { Cookie: cookie },
      });
      const sessionId = cookie.split('=')[1] ?? '';
      expect(await ctx.store.load(sessionId)).toMatchObject({ accessToken: 'access-1' });

      await ctx.route.request('/logout', { method: 'POST', headers: { Cookie: cookie } });

      expect(await ctx.store.load(sessionId)).toBeNull();
      expect(ctx.store.size).toBe(0);
    });

    it('should drop a token that expired without a refresh token', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);
      await ctx.route.request(`/callback?code=short-code&state=${state}`, {
        headers: { Cookie: cookie },
      });
      expect(ctx.registry.size).toBe(1);
      expect(ctx.store.size).toBe(1);

      const session = await ctx.route.request('/session', { headers: { Cookie: cookie } });

      await expect(session.json()).resolves.toEqual({ authenticated: false });
      expect(ctx.registry.size).toBe(0);
      expect(ctx.store.size).toBe(0);
    });

    it('should never expose token material', async () => {
      const { state, cookie } = await startAuthorization(ctx.route);
      await ctx.route.request(`/callback?code=good-code&state=${state}`, {
        headers: { Cookie: cookie },
      });

      const body = await (await ctx.route.request('/session', { headers: { Cookie: cookie } })).text();

      expect(body).not.toContain('access-1');
      expect(body).not.toContain('refresh-1');
    });
  });
});

describe('createClientApp', () => {
  it('should mount the route under /oauth next to a health check', async () => {
    const exchanger = new TokenExchanger(
      new ClientProfile({
        clientId: 'test-client',
        clientSecret: 'test-secret',
        site: 'https://auth.example.com',
      }),
    );
    const app = createClientApp({ exchanger });

    const health = await app.request('/health');
    const authorize = await app.request('/oauth/authorize');

    await expect(health.json()).resolves.toEqual({ status: 'ok' });
    expect(authorize.status).toBe(307);
  });
});
