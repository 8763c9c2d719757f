/**
 * Web integration of the tokenwright client: mounts the authorization code
 * flow on a Hono app and serves it on Node.
 * @public
 * @see file:./dev.ts - Development server entry point
 */

import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { createScopedLogger } from '@tokenwright/core';
import { createOAuthClientRoute, type OAuthClientRouteOptions } from './api/oauth-client.js';

export * from './api/oauth-client.js';
export type { OAuthClientEnv, SessionCookieOptions } from './api/oauth-client/types.js';
export * from './oauth/pending-state-store.js';

/**
 * Configuration options for web server startup.
 * @public
 */
export interface ServerOptions extends OAuthClientRouteOptions {
  /** HTTP server port, defaults to 3456 */
  port?: number;
  /** Bind address, defaults to 127.0.0.1 */
  host?: string;
  /** Mount point of the OAuth routes, defaults to /oauth */
  basePath?: string;
}

/**
 * Builds the application: the OAuth client route plus a health check.
 * @public
 */
export function createClientApp(options: OAuthClientRouteOptions, basePath: string = '/oauth'): Hono {
  const app = new Hono();
  app.get('/health', (c) => c.json({ status: 'ok' }));
  app.route(basePath, createOAuthClientRoute(options));
  return app;
}

/**
 * Starts the client app on Node's HTTP server.
 * @public
 */
export function startClientServer(options: ServerOptions): ServerType {
  const log = createScopedLogger('server');
  const port = options.port ?? 3456;
  const hostname = options.host ?? '127.0.0.1';
  const app = createClientApp(options, options.basePath);

  return serve({ fetch: app.fetch, port, hostname }, (info) => {
    log.info({ port: info.port, address: info.address }, 'OAuth client server listening');
  });
}
