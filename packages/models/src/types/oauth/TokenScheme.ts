/**
 * Where an access token is placed on an outgoing request
 */
export type TokenLocation = 'auth-header' | 'uri-query';

/**
 * Parsed form of a token scheme descriptor such as 'auth-header:Bearer'.
 * The label is the Authorization header prefix or the query parameter name.
 */
export interface TokenScheme {
  location: TokenLocation;
  label: string;
}
