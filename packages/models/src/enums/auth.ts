/**
 * Grant types this client sends to the token endpoint
 */
export const GrantTypes = {
  AUTHORIZATION_CODE: 'authorization_code',
  REFRESH_TOKEN: 'refresh_token',
} as const;

export const ResponseTypes = {
  CODE: 'code',
} as const;

export const TokenLocations = {
  AUTH_HEADER: 'auth-header',
  URI_QUERY: 'uri-query',
} as const;
