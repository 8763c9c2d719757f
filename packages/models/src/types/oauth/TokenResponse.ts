/**
 * Token endpoint response after parsing (JSON or form-encoded)
 */
export interface TokenResponse {
  /** Access token */
  access_token: string;
  /** Token type reported by the server, e.g. 'Bearer' */
  token_type?: string;
  /** Token lifetime in seconds */
  expires_in?: number;
  /** Refresh token, present on grant and when the server rotates it */
  refresh_token?: string;
  /** Granted scopes */
  scope?: string;
}
