/**
 * Token endpoint request construction
 * Pure functions, no I/O
 */
import type { OutgoingRequest } from '@tokenwright/models';
import { GrantTypes } from '@tokenwright/models';

export const TOKEN_REQUEST_ACCEPT = 'application/json, application/x-www-form-urlencoded';

/**
 * Client credentials sent in the token request body
 */
export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export interface CodeExchangeParams extends ClientCredentials {
  grantType?: string;
  code: string;
  redirectUri?: string;
}

export interface RefreshParams extends ClientCredentials {
  refreshToken: string;
}

/**
 * Build the authorization code exchange body.
 * `redirect_uri` is only sent when one is configured.
 * @internal
 */
export function buildCodeExchangeBody(params: CodeExchangeParams): URLSearchParams {
  const body = new URLSearchParams({
    grant_type: params.grantType ?? GrantTypes.AUTHORIZATION_CODE,
    code: params.code,
    client_id: params.clientId,
    client_secret: params.clientSecret,
  });

  if (params.redirectUri) {
    body.set('redirect_uri', params.redirectUri);
  }

  return body;
}

/**
 * Build the refresh_token grant body
 * @internal
 */
export function buildRefreshBody(params: RefreshParams): URLSearchParams {
  return new URLSearchParams({
    grant_type: GrantTypes.REFRESH_TOKEN,
    refresh_token: params.refreshToken,
    client_id: params.clientId,
    client_secret: params.clientSecret,
  });
}

/**
 * Wraps a grant body into the POST sent to the token endpoint
 * @internal
 */
export function buildTokenRequest(tokenEndpoint: string, body: URLSearchParams): OutgoingRequest {
  return {
    method: 'POST',
    url: tokenEndpoint,
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: TOKEN_REQUEST_ACCEPT,
    },
    body: body.toString(),
  };
}
