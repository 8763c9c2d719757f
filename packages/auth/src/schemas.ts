/**
 * Client profile configuration schema with field normalization.
 *
 * Accepts the field names used by common config files and normalizes them:
 * - authorizeUrl / authorizationEndpoint → authorizePath
 * - tokenUrl / tokenEndpoint → accessTokenPath
 * - scopes (array) → scope (space-separated string)
 *
 * @example
 * ```typescript
 * const settings = ClientProfileConfigSchema.parse({
 *   clientId: 'my-client',
 *   clientSecret: 'secret',
 *   site: 'https://auth.example.com',
 *   tokenUrl: '/oauth/v2/token', // normalized to accessTokenPath
 *   scopes: ['read', 'write'], // normalized to 'read write'
 * });
 * ```
 *
 * @public
 */

import { z } from 'zod';

const TOKEN_SCHEME_PATTERN = /^(auth-header|uri-query):\S+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Moves the first present alias onto `target`. An explicit `target` wins.
 */
function adoptAlias(
  record: Record<string, unknown>,
  target: string,
  aliases: readonly string[],
): void {
  for (const alias of aliases) {
    if (record[target] === undefined && record[alias] !== undefined) {
      record[target] = record[alias];
    }
    delete record[alias];
  }
}

const ClientProfileConfigBaseSchema = z.object({
  clientId: z.string().trim().min(1),
  clientSecret: z.string().min(1),
  site: z.string().url(),
  authorizePath: z.string().min(1).optional(),
  accessTokenPath: z.string().min(1).optional(),
  redirectUri: z.string().url().optional(),
  scope: z.string().optional(),
  referer: z.string().optional(),
  grantType: z.string().min(1).optional(),
  tokenScheme: z
    .string()
    .regex(TOKEN_SCHEME_PATTERN, "must look like 'auth-header:Bearer' or 'uri-query:access_token'")
    .optional(),
});

/**
 * Zod schema for a client profile, aliases included.
 *
 * @public
 * @see {@link ClientProfileConfigZod}
 */
export const ClientProfileConfigSchema = z.preprocess((input: unknown) => {
  if (!isRecord(input)) return input;

  const result: Record<string, unknown> = { ...input };
  adoptAlias(result, 'authorizePath', ['authorizeUrl', 'authorizationEndpoint']);
  adoptAlias(result, 'accessTokenPath', ['tokenUrl', 'tokenEndpoint']);

  // scopes wins over scope when both are given
  if (result.scopes !== undefined) {
    result.scope = Array.isArray(result.scopes) ? result.scopes.join(' ') : result.scopes;
    delete result.scopes;
  }

  return result;
}, ClientProfileConfigBaseSchema);

/**
 * Names of every string field, aliases included, that may carry `${VAR}`
 * references.
 */
export const CLIENT_PROFILE_STRING_FIELDS = [
  'clientId',
  'clientSecret',
  'site',
  'authorizePath',
  'authorizeUrl',
  'authorizationEndpoint',
  'accessTokenPath',
  'tokenUrl',
  'tokenEndpoint',
  'redirectUri',
  'scope',
  'referer',
  'grantType',
  'tokenScheme',
] as const;

export type ClientProfileConfigZod = z.infer<typeof ClientProfileConfigSchema>;
