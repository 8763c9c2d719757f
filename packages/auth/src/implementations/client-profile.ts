import type { ClientProfileSettings } from '@tokenwright/models';
import { GrantTypes } from '@tokenwright/models';
import { ValidationUtils } from '@tokenwright/core';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_TOKEN_SCHEME, parseTokenScheme } from '../utils/token-scheme.js';
import type { AccessToken } from './access-token.js';

export const DEFAULT_AUTHORIZE_PATH = '/oauth/authorize';
export const DEFAULT_ACCESS_TOKEN_PATH = '/oauth/token';

/**
 * Called after every successful code exchange and refresh. A rejection
 * surfaces to the caller as AutoSaveError.
 */
export type AutoSaveHook = (profile: ClientProfile, token: AccessToken) => void | Promise<void>;

export interface ClientProfileConfig extends ClientProfileSettings {
  autoSave?: AutoSaveHook;
}

const ABSOLUTE_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Immutable registration of this client with one authorization server.
 * Construct once, share freely; tokens reach it through their exchanger.
 */
export class ClientProfile {
  public readonly clientId: string;
  public readonly clientSecret: string;
  public readonly site: string;
  public readonly authorizePath: string;
  public readonly accessTokenPath: string;
  public readonly redirectUri?: string;
  public readonly scope?: string;
  public readonly referer?: string;
  public readonly grantType: string;
  public readonly tokenScheme: string;
  public readonly autoSave?: AutoSaveHook;

  /** Resolved authorization endpoint */
  public readonly authorizeEndpoint: string;
  /** Resolved token endpoint */
  public readonly tokenEndpoint: string;

  public constructor(config: ClientProfileConfig) {
    try {
      ValidationUtils.validateRequired(config, ['clientId', 'clientSecret', 'site'], 'Client profile');
      ValidationUtils.validateHttpUrl(config.site, 'site');
      if (config.redirectUri !== undefined) {
        ValidationUtils.validateUrl(config.redirectUri, 'redirectUri');
      }
    } catch (error) {
      const cause = toError(error);
      throw new ConfigurationError(cause.message, cause);
    }

    this.clientId = config.clientId;
    this.clientSecret = config.clientSecret;
    this.site = config.site;
    this.authorizePath = config.authorizePath ?? DEFAULT_AUTHORIZE_PATH;
    this.accessTokenPath = config.accessTokenPath ?? DEFAULT_ACCESS_TOKEN_PATH;
    this.redirectUri = config.redirectUri;
    this.scope = config.scope;
    this.referer = config.referer;
    this.grantType = config.grantType ?? GrantTypes.AUTHORIZATION_CODE;
    this.tokenScheme = config.tokenScheme ?? DEFAULT_TOKEN_SCHEME;
    this.autoSave = config.autoSave;

    // Fail at construction rather than on first use
    parseTokenScheme(this.tokenScheme);
    this.authorizeEndpoint = this.resolveEndpoint(this.authorizePath, 'authorizePath');
    this.tokenEndpoint = this.resolveEndpoint(this.accessTokenPath, 'accessTokenPath');

    Object.freeze(this);
  }

  /**
   * Settings without the secret, for logs and diagnostics
   */
  public describe(): Omit<ClientProfileSettings, 'clientSecret'> {
    return {
      clientId: this.clientId,
      site: this.site,
      authorizePath: this.authorizePath,
      accessTokenPath: this.accessTokenPath,
      redirectUri: this.redirectUri,
      scope: this.scope,
      referer: this.referer,
      grantType: this.grantType,
      tokenScheme: this.tokenScheme,
    };
  }

  /**
   * Absolute URLs are used as-is; anything else is appended to `site`
   * with exactly one slash between them.
   */
  private resolveEndpoint(path: string, field: string): string {
    const candidate = ABSOLUTE_URL.test(path)
      ? path
      : `${this.site.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;

    try {
      return ValidationUtils.validateHttpUrl(candidate, field).toString();
    } catch (error) {
      const cause = toError(error);
      throw new ConfigurationError(cause.message, cause);
    }
  }
}
