/**
 * OAuth2 Authorization URL building utilities
 * Pure functions for constructing authorization redirects
 */
import type { AuthorizationRequest } from '@tokenwright/models';
import { ResponseTypes } from '@tokenwright/models';
import type { ClientProfile } from '../implementations/client-profile.js';

/**
 * Per-request overrides; anything omitted falls back to the profile.
 * @public
 */
export interface AuthorizeUrlOptions {
  clientId?: string;
  responseType?: string;
  redirectUri?: string;
  scope?: string;
  /** Opaque value the caller checks again on callback */
  state?: string;
}

/**
 * Framework-neutral redirect the caller turns into its own response type
 * @public
 */
export interface AuthorizeRedirect {
  status: 307;
  headers: { Location: string };
  body: '';
}

/**
 * Resolves the authorization request parameters against the profile.
 * @public
 */
export function createAuthorizationRequest(
  profile: ClientProfile,
  options: AuthorizeUrlOptions = {},
): AuthorizationRequest {
  return {
    responseType: options.responseType ?? ResponseTypes.CODE,
    clientId: options.clientId ?? profile.clientId,
    redirectUri: options.redirectUri ?? profile.redirectUri,
    scope: options.scope ?? profile.scope,
    state: options.state,
  };
}

/**
 * Builds the authorization endpoint URL the resource owner is sent to.
 *
 * Query parameters already present on the configured authorize path are kept.
 * `redirect_uri`, `scope` and `state` are left out when empty. The client
 * secret is never part of the URL.
 * @param profile - Client profile supplying the endpoint and defaults
 * @param options - Per-request overrides
 * @example
 * ```typescript
 * const url = buildAuthorizeUrl(profile, { state: generateState() });
 * // https://auth.example.com/oauth/authorize?response_type=code&client_id=...&state=...
 * ```
 * @public
 * @see file:./state.ts - generateState for the state value
 */
export function buildAuthorizeUrl(profile: ClientProfile, options: AuthorizeUrlOptions = {}): URL {
  const request = createAuthorizationRequest(profile, options);

  const authUrl = new URL(profile.authorizeEndpoint);
  authUrl.searchParams.set('response_type', request.responseType);
  authUrl.searchParams.set('client_id', request.clientId);

  if (request.redirectUri) {
    authUrl.searchParams.set('redirect_uri', request.redirectUri);
  }
  if (request.scope) {
    authUrl.searchParams.set('scope', request.scope);
  }
  if (request.state) {
    authUrl.searchParams.set('state', request.state);
  }

  return authUrl;
}

/**
 * Same as buildAuthorizeUrl, shaped as a 307 redirect.
 * @public
 */
export function buildAuthorizeRedirect(
  profile: ClientProfile,
  options: AuthorizeUrlOptions = {},
): AuthorizeRedirect {
  return {
    status: 307,
    headers: { Location: buildAuthorizeUrl(profile, options).toString() },
    body: '',
  };
}
