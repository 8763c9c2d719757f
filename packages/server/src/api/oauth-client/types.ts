import type { Handler } from 'hono';
import type { SessionTokenRegistry, TokenExchanger } from '@tokenwright/auth';
import type { ITokenStore } from '@tokenwright/core';
import type { PendingStateStore } from '../../oauth/pending-state-store.js';

export interface SessionCookieOptions {
  name: string;
  /** Send the cookie over HTTPS only */
  secure: boolean;
  maxAgeSeconds: number;
}

export type OAuthClientEnv = {
  Variables: {
    exchanger: TokenExchanger;
    registry: SessionTokenRegistry;
    /** Persisted records to drop alongside registry entries */
    tokenStore: ITokenStore | undefined;
    pendingStates: PendingStateStore;
    sessionCookie: SessionCookieOptions;
  };
};
export type OAuthClientHandler = Handler<OAuthClientEnv>;
