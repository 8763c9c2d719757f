import type { AccessTokenRecord, TokenResponse } from '@tokenwright/models';
import { logEvent } from '@tokenwright/core';
import { ConfigurationError } from '../errors/index.js';
import type { ClientProfile } from './client-profile.js';
import type { ExchangeRefreshOptions, TokenExchanger } from './token-exchanger.js';

export type AccessTokenState = 'fresh' | 'expired';

export interface AccessTokenInit {
  accessToken: string;
  refreshToken?: string;
  expiresAt?: Date;
  tokenScheme?: string;
  tokenType?: string;
  scope?: string;
  /** Caller-side correlation key, used by auto-save adapters */
  sessionId?: string;
  changed?: boolean;
}

/**
 * Access token granted to one session.
 *
 * Mutated in place by refresh. All exchanges go through the TokenExchanger the
 * token was created with, which is also how the token reaches its profile.
 */
export class AccessToken {
  public accessToken: string;
  public refreshToken?: string;
  public expiresAt?: Date;
  /** Overrides the profile's scheme for this token only */
  public tokenScheme?: string;
  /** token_type as reported by the server; informational */
  public tokenType?: string;
  public scope?: string;
  public sessionId?: string;
  /** Set on grant and refresh; cleared only by persistence through markSaved() */
  public changed: boolean;

  private readonly exchanger: TokenExchanger;
  private refreshPromise?: Promise<void>;

  public constructor(exchanger: TokenExchanger, init: AccessTokenInit) {
    this.exchanger = exchanger;
    this.accessToken = init.accessToken;
    this.refreshToken = init.refreshToken;
    this.expiresAt = init.expiresAt;
    this.tokenScheme = init.tokenScheme;
    this.tokenType = init.tokenType;
    this.scope = init.scope;
    this.sessionId = init.sessionId;
    this.changed = init.changed ?? false;
  }

  public get profile(): ClientProfile {
    return this.exchanger.profile;
  }

  /** Scheme in force: the token's override, else the profile's */
  public get scheme(): string {
    return this.tokenScheme ?? this.profile.tokenScheme;
  }

  /**
   * True iff an expiry is known and has been reached. Tokens without an
   * expiry never expire on their own.
   */
  public isExpired(now: Date = new Date()): boolean {
    return this.expiresAt !== undefined && now.getTime() >= this.expiresAt.getTime();
  }

  public state(now: Date = new Date()): AccessTokenState {
    return this.isExpired(now) ? 'expired' : 'fresh';
  }

  public canRefresh(): boolean {
    return Boolean(this.refreshToken);
  }

  /**
   * Refreshes through the token endpoint; see TokenExchanger.exchangeRefresh.
   */
  public refresh(options?: ExchangeRefreshOptions): Promise<AccessToken> {
    return this.exchanger.exchangeRefresh(this, options);
  }

  /**
   * Returns this token once it is usable at `now`, refreshing when expired.
   * @throws ConfigurationError when expired and not refreshable; the caller
   *   has to run the authorization code flow again
   */
  public async ensureFresh(now: Date = new Date()): Promise<AccessToken> {
    if (!this.isExpired(now)) {
      return this;
    }
    if (!this.canRefresh()) {
      throw ConfigurationError.expiredWithoutRefreshToken();
    }
    return this.refresh();
  }

  /**
   * Acknowledges that the current values are persisted.
   */
  public markSaved(): void {
    this.changed = false;
  }

  /**
   * Applies a successful refresh response.
   *
   * `expiresAt` is recomputed from `expires_in` and cleared without it; the
   * refresh token is only replaced when the server rotated it.
   * @internal
   */
  public applyRefresh(response: TokenResponse, receivedAt: number = Date.now()): void {
    this.accessToken = response.access_token;
    this.expiresAt = expiryFrom(response, receivedAt);
    if (response.refresh_token) {
      this.refreshToken = response.refresh_token;
    }
    if (response.token_type) {
      this.tokenType = response.token_type;
    }
    if (response.scope) {
      this.scope = response.scope;
    }
    this.changed = true;
  }

  /**
   * Runs `refresh` unless one is already in flight for this token, in which
   * case the caller joins it and observes its outcome.
   * @internal
   */
  public async runExclusiveRefresh(refresh: () => Promise<void>): Promise<AccessToken> {
    if (this.refreshPromise) {
      logEvent('debug', 'auth:refresh_joined', { sessionId: this.sessionId });
      await this.refreshPromise;
      return this;
    }

    this.refreshPromise = refresh();
    try {
      await this.refreshPromise;
    } finally {
      this.refreshPromise = undefined;
    }
    return this;
  }

  public toJSON(): AccessTokenRecord {
    return {
      accessToken: this.accessToken,
      refreshToken: this.refreshToken,
      expiresAt: this.expiresAt?.toISOString(),
      tokenScheme: this.tokenScheme,
      tokenType: this.tokenType,
      scope: this.scope,
    };
  }

  /**
   * Creates the token for a successful code exchange (`changed = true`).
   * @internal
   */
  public static fromTokenResponse(
    exchanger: TokenExchanger,
    response: TokenResponse,
    sessionId?: string,
    receivedAt: number = Date.now(),
  ): AccessToken {
    return new AccessToken(exchanger, {
      accessToken: response.access_token,
      refreshToken: response.refresh_token,
      expiresAt: expiryFrom(response, receivedAt),
      tokenType: response.token_type,
      scope: response.scope,
      sessionId,
      changed: true,
    });
  }

  /**
   * Restores a persisted token (`changed = false`).
   * @throws ConfigurationError when the record has no access token or an unreadable expiry
   */
  public static fromJSON(
    exchanger: TokenExchanger,
    record: AccessTokenRecord,
    sessionId?: string,
  ): AccessToken {
    if (!record.accessToken) {
      throw new ConfigurationError('Stored token record has no access token');
    }

    let expiresAt: Date | undefined;
    if (record.expiresAt !== undefined) {
      expiresAt = new Date(record.expiresAt);
      if (Number.isNaN(expiresAt.getTime())) {
        throw new ConfigurationError(`Stored token record has an invalid expiresAt: ${record.expiresAt}`);
      }
    }

    return new AccessToken(exchanger, {
      accessToken: record.accessToken,
      refreshToken: record.refreshToken,
      expiresAt,
      tokenScheme: record.tokenScheme,
      tokenType: record.tokenType,
      scope: record.scope,
      sessionId,
      changed: false,
    });
  }
}

function expiryFrom(response: TokenResponse, receivedAt: number): Date | undefined {
  return response.expires_in === undefined
    ? undefined
    : new Date(receivedAt + response.expires_in * 1000);
}
