import type { OutgoingRequest, TransportResponse } from '@tokenwright/models';
import { TokenLocations } from '@tokenwright/models';
import {
  FetchHttpTransport,
  type HttpTransport,
  type IAuthProvider,
  logEvent,
} from '@tokenwright/core';
import { ConfigurationError, NetworkError } from '../errors/index.js';
import { parseTokenScheme } from '../utils/token-scheme.js';
import type { AccessToken } from './access-token.js';

/** Refresh this long before the recorded expiry */
export const DEFAULT_REFRESH_SKEW_MS = 60_000;

function withoutHeader(headers: Record<string, string>, name: string): Record<string, string> {
  const lower = name.toLowerCase();
  return Object.fromEntries(
    Object.entries(headers).filter(([key]) => key.toLowerCase() !== lower),
  );
}

function queryKey(pair: string): string {
  const raw = pair.split('=', 1)[0] ?? '';
  try {
    return decodeURIComponent(raw.replace(/\+/g, ' '));
  } catch {
    // malformed escapes never equal an encoded parameter name
    return raw;
  }
}

/**
 * Drops every `name` pair from the query of an absolute URL and appends
 * `name=value`. Other pairs keep their exact spelling; the fragment stays last.
 */
function withQueryParam(url: string, name: string, value: string): string {
  try {
    new URL(url);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot attach the token to a relative URL: ${url}`,
      error instanceof Error ? error : undefined,
    );
  }

  const hashAt = url.indexOf('#');
  const fragment = hashAt === -1 ? '' : url.slice(hashAt);
  const withoutFragment = hashAt === -1 ? url : url.slice(0, hashAt);
  const queryAt = withoutFragment.indexOf('?');
  const base = queryAt === -1 ? withoutFragment : withoutFragment.slice(0, queryAt);
  const query = queryAt === -1 ? '' : withoutFragment.slice(queryAt + 1);

  const pairs = query.split('&').filter((pair) => pair !== '' && queryKey(pair) !== name);
  pairs.push(`${encodeURIComponent(name)}=${encodeURIComponent(value)}`);
  return `${base}?${pairs.join('&')}${fragment}`;
}

/**
 * Headers the token contributes under `scheme`. A `uri-query` scheme adds
 * no Authorization header; Referer is added whenever the profile has one.
 * @public
 */
export function buildAuthorizationHeaders(
  token: AccessToken,
  scheme: string = token.scheme,
): Record<string, string> {
  const { location, label } = parseTokenScheme(scheme);
  const headers: Record<string, string> = {};

  if (location === TokenLocations.AUTH_HEADER) {
    headers.Authorization = `${label} ${token.accessToken}`;
  }
  if (token.profile.referer) {
    headers.Referer = token.profile.referer;
  }

  return headers;
}

/**
 * Returns a copy of `request` carrying the access token.
 *
 * `auth-header:<label>` replaces any Authorization header (whatever its case)
 * with `<label> <token>`. `uri-query:<param>` removes any `<param>` pair from
 * the query and appends `<param>=<token>`, leaving the other pairs as written.
 * Applying it twice gives the same request.
 * @param request - Request to decorate; not modified
 * @param token - Token to attach
 * @param scheme - Defaults to the token's scheme, then the profile's
 * @throws ConfigurationError for a malformed scheme, or a relative URL under `uri-query`
 * @public
 */
export function attachAccessToken(
  request: OutgoingRequest,
  token: AccessToken,
  scheme: string = token.scheme,
): OutgoingRequest {
  const { location, label } = parseTokenScheme(scheme);
  let headers = { ...request.headers };
  let url = request.url;

  const added = buildAuthorizationHeaders(token, scheme);
  for (const [name, value] of Object.entries(added)) {
    headers = withoutHeader(headers, name);
    headers[name] = value;
  }

  if (location === TokenLocations.URI_QUERY) {
    url = withQueryParam(request.url, label, token.accessToken);
  }

  return { ...request, url, headers };
}

export interface RequestAuthenticatorOptions {
  /** Used by send(); defaults to a FetchHttpTransport */
  transport?: HttpTransport;
  /** How early to refresh ahead of expiry; defaults to DEFAULT_REFRESH_SKEW_MS */
  refreshSkewMs?: number;
}

/**
 * Binds one token to outgoing resource requests, refreshing it when it is
 * about to expire or when the resource answers 401.
 */
export class RequestAuthenticator implements IAuthProvider {
  private readonly transport: HttpTransport;
  private readonly refreshSkewMs: number;

  public constructor(
    public readonly token: AccessToken,
    options: RequestAuthenticatorOptions = {},
  ) {
    this.transport = options.transport ?? new FetchHttpTransport();
    this.refreshSkewMs = options.refreshSkewMs ?? DEFAULT_REFRESH_SKEW_MS;
  }

  /**
   * Decorates `request`, refreshing first when the token is (nearly) expired.
   */
  public async authorize(request: OutgoingRequest): Promise<OutgoingRequest> {
    await this.ensureUsableToken();
    return attachAccessToken(request, this.token);
  }

  /**
   * Sends an authorized request. On 401 a refreshable token is refreshed once
   * and the request retried once; otherwise the 401 is returned as-is.
   * @throws NetworkError when the transport fails
   */
  public async send(request: OutgoingRequest): Promise<TransportResponse> {
    const response = await this.dispatch(await this.authorize(request));
    if (response.status !== 401 || !this.token.canRefresh()) {
      return response;
    }

    logEvent('info', 'auth:resource_unauthorized', {
      sessionId: this.token.sessionId,
      method: request.method,
    });
    await this.token.refresh();
    return this.dispatch(attachAccessToken(request, this.token));
  }

  public async getHeaders(): Promise<Record<string, string>> {
    await this.ensureUsableToken();
    return buildAuthorizationHeaders(this.token);
  }

  public async isValid(): Promise<boolean> {
    return !this.token.isExpired(new Date(Date.now() + this.refreshSkewMs));
  }

  public async refresh(): Promise<void> {
    await this.token.refresh();
  }

  private async ensureUsableToken(): Promise<void> {
    const horizon = new Date(Date.now() + this.refreshSkewMs);
    if (!this.token.isExpired(horizon)) {
      return;
    }
    if (this.token.canRefresh()) {
      await this.token.refresh();
      return;
    }
    // Within the skew window but not yet expired: still usable
    if (this.token.isExpired()) {
      throw ConfigurationError.expiredWithoutRefreshToken();
    }
  }

  private async dispatch(request: OutgoingRequest): Promise<TransportResponse> {
    try {
      return await this.transport.send(request);
    } catch (error) {
      throw NetworkError.fromTransportError(error);
    }
  }
}
