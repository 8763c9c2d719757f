import type { TokenLocation, TokenScheme } from '@tokenwright/models';
import { TokenLocations } from '@tokenwright/models';
import { ConfigurationError } from '../errors/index.js';

export const DEFAULT_TOKEN_SCHEME = 'auth-header:Bearer';

function isTokenLocation(value: string): value is TokenLocation {
  return value === TokenLocations.AUTH_HEADER || value === TokenLocations.URI_QUERY;
}

/**
 * Splits a scheme descriptor such as `auth-header:Bearer` or
 * `uri-query:access_token` at its first colon.
 * @param descriptor - Scheme string from the profile or the token
 * @throws ConfigurationError when the location is unknown or the label empty
 * @public
 */
export function parseTokenScheme(descriptor: string): TokenScheme {
  const separator = descriptor.indexOf(':');
  const location = separator === -1 ? descriptor : descriptor.slice(0, separator);
  const label = separator === -1 ? '' : descriptor.slice(separator + 1).trim();

  if (!isTokenLocation(location)) {
    throw new ConfigurationError(`Unknown token location in scheme '${descriptor}'`);
  }
  if (!label) {
    throw new ConfigurationError(`Token scheme '${descriptor}' has no label`);
  }

  return { location, label };
}
