import type { TokenResponse, TransportResponse } from '@tokenwright/models';
import { FetchHttpTransport, type HttpTransport, logEvent, RequestUtils } from '@tokenwright/core';
import { AuthenticationError, ConfigurationError, NetworkError } from '../errors/index.js';
import {
  buildCodeExchangeBody,
  buildRefreshBody,
  buildTokenRequest,
} from '../utils/token-exchange.js';
import { parseTokenResponse } from '../utils/token/parse-token-response.js';
import { AccessToken } from './access-token.js';
import { ChangeNotifier } from './change-notifier.js';
import type { ClientProfile } from './client-profile.js';

/**
 * Credential overrides for a token request. A refresh that joins one already
 * in flight for the same token sends nothing itself, so its overrides are not
 * used; the request goes out with those of the caller that started it.
 */
export interface ExchangeRefreshOptions {
  clientId?: string;
  clientSecret?: string;
}

export interface ExchangeCodeOptions extends ExchangeRefreshOptions {
  redirectUri?: string;
  /** Attached to the new token before the auto-save hook sees it */
  sessionId?: string;
}

export interface TokenExchangerOptions {
  /** Defaults to a FetchHttpTransport */
  transport?: HttpTransport;
  notifier?: ChangeNotifier;
}

/**
 * Talks to the token endpoint of one client profile: trades authorization
 * codes for tokens and refreshes existing tokens in place.
 */
export class TokenExchanger {
  public readonly profile: ClientProfile;
  private readonly transport: HttpTransport;
  private readonly notifier: ChangeNotifier;

  public constructor(profile: ClientProfile, options: TokenExchangerOptions = {}) {
    this.profile = profile;
    this.transport = options.transport ?? new FetchHttpTransport();
    this.notifier = options.notifier ?? new ChangeNotifier();
  }

  /**
   * Exchanges an authorization code for a new token.
   *
   * @param code - Code returned to the redirect URI
   * @param options - Credential and redirect URI overrides
   * @returns A token with `changed = true`, already passed to the auto-save hook
   * @throws ConfigurationError for an empty code
   * @throws NetworkError when the transport fails
   * @throws ProtocolError when the token endpoint rejects the code or answers unusably
   * @throws AutoSaveError when the hook fails; the token is on the error
   */
  public async exchangeCode(code: string, options: ExchangeCodeOptions = {}): Promise<AccessToken> {
    if (!code || !code.trim()) {
      throw ConfigurationError.missingCode();
    }

    const requestId = RequestUtils.generateRequestId('code');
    const body = buildCodeExchangeBody({
      grantType: this.profile.grantType,
      code,
      clientId: options.clientId ?? this.profile.clientId,
      clientSecret: options.clientSecret ?? this.profile.clientSecret,
      redirectUri: options.redirectUri ?? this.profile.redirectUri,
    });

    const response = await this.requestToken(body, requestId);
    const token = AccessToken.fromTokenResponse(this, response, options.sessionId);

    logEvent('info', 'auth:code_exchanged', {
      requestId,
      sessionId: options.sessionId,
      expiresAt: token.expiresAt?.toISOString(),
      hasRefreshToken: token.canRefresh(),
      scope: token.scope,
    });

    await this.notifier.notify(this.profile, token);
    return token;
  }

  /**
   * Refreshes `token` in place. Concurrent calls for the same token share a
   * single token endpoint request.
   *
   * @returns The same token object, updated and passed to the auto-save hook
   * @throws ConfigurationError when the token has no refresh token or belongs to another profile
   * @throws NetworkError when the transport fails; the token is unchanged
   * @throws ProtocolError when the server rejects the refresh; the token is unchanged
   * @throws AutoSaveError when the hook fails; the token keeps its new values
   */
  public async exchangeRefresh(
    token: AccessToken,
    options: ExchangeRefreshOptions = {},
  ): Promise<AccessToken> {
    if (token.profile !== this.profile) {
      throw ConfigurationError.foreignToken();
    }
    if (!token.refreshToken) {
      throw ConfigurationError.missingRefreshToken();
    }

    return token.runExclusiveRefresh(() => this.performRefresh(token, options));
  }

  private async performRefresh(token: AccessToken, options: ExchangeRefreshOptions): Promise<void> {
    const refreshToken = token.refreshToken;
    if (!refreshToken) {
      throw ConfigurationError.missingRefreshToken();
    }

    const requestId = RequestUtils.generateRequestId('refresh');
    const body = buildRefreshBody({
      refreshToken,
      clientId: options.clientId ?? this.profile.clientId,
      clientSecret: options.clientSecret ?? this.profile.clientSecret,
    });

    const response = await this.requestToken(body, requestId);
    token.applyRefresh(response);

    logEvent('info', 'auth:token_refreshed', {
      requestId,
      sessionId: token.sessionId,
      expiresAt: token.expiresAt?.toISOString(),
      rotated: response.refresh_token !== undefined,
    });

    await this.notifier.notify(this.profile, token);
  }

  private async requestToken(body: URLSearchParams, requestId: string): Promise<TokenResponse> {
    const request = buildTokenRequest(this.profile.tokenEndpoint, body);

    let response: TransportResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      const networkError = NetworkError.fromTransportError(error);
      logEvent('warn', 'auth:token_request_failed', {
        requestId,
        endpoint: this.profile.tokenEndpoint,
        reason: networkError.message,
      });
      throw networkError;
    }

    try {
      return parseTokenResponse(response);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        logEvent('warn', 'auth:token_response_rejected', {
          requestId,
          status: response.status,
          errorCode: error.code,
        });
      }
      throw error;
    }
  }
}
