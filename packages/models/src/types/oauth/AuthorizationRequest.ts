/**
 * Parameters sent to the authorization endpoint when redirecting the resource owner
 */
export interface AuthorizationRequest {
  /** Response type ('code' for the authorization code grant) */
  responseType: string;
  /** Client identifier */
  clientId: string;
  /** Redirect URI the authorization server calls back */
  redirectUri?: string;
  /** Space-delimited requested scopes */
  scope?: string;
  /** Opaque value correlated by the caller on callback */
  state?: string;
}
