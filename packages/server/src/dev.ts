/**
 * Development server entry point.
 *
 * Reads the client profile from OAUTH_* environment variables, keeps tokens
 * in memory and serves the authorization flow under /oauth.
 * Listens on PORT (default 3456) and HOST (default 127.0.0.1); set
 * TOKENWRIGHT_LOG_LEVEL=info to see it log.
 * @internal
 */

import {
  ClientProfile,
  MemoryTokenStore,
  TokenExchanger,
  createAutoSaveHook,
  loadClientProfileConfigFromEnv,
} from '@tokenwright/auth';
import { logError } from '@tokenwright/core';
import { startClientServer } from './index.js';

function main(): void {
  const port = process.env.PORT ? Number(process.env.PORT) : 3456;
  const host = process.env.HOST ?? '127.0.0.1';

  const store = new MemoryTokenStore();
  const profile = new ClientProfile({
    ...loadClientProfileConfigFromEnv(),
    autoSave: createAutoSaveHook(store),
  });

  startClientServer({
    exchanger: new TokenExchanger(profile),
    tokenStore: store,
    port,
    host,
    sessionCookie: { secure: process.env.NODE_ENV === 'production' },
  });
}

try {
  main();
} catch (error) {
  logError('server:dev', error);
  process.exit(1);
}
