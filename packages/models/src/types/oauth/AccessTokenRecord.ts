/**
 * Serializable snapshot of an access token, as handed to persistence layers
 */
export interface AccessTokenRecord {
  accessToken: string;
  refreshToken?: string;
  /** ISO-8601 timestamp; absent when the server gave no expires_in */
  expiresAt?: string;
  /** Attachment scheme override, e.g. 'uri-query:access_token' */
  tokenScheme?: string;
  tokenType?: string;
  scope?: string;
}
