/**
 * Plain configuration of an authorization code client.
 *
 * Paths are joined to `site` unless they are absolute URLs themselves.
 */
export interface ClientProfileSettings {
  clientId: string;
  clientSecret: string;
  /** Base URI of the authorization server */
  site: string;
  authorizePath?: string;
  accessTokenPath?: string;
  redirectUri?: string;
  scope?: string;
  /** Sent as the Referer header on authorized resource requests */
  referer?: string;
  grantType?: string;
  /** '<location>:<label>', defaults to 'auth-header:Bearer' */
  tokenScheme?: string;
}
