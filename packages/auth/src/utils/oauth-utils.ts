import type { ClientProfileSettings } from '@tokenwright/models';
import { EnvironmentResolutionError, resolveConfigFields } from '@tokenwright/core';
import { ConfigurationError } from '../errors/index.js';
import { CLIENT_PROFILE_STRING_FIELDS, ClientProfileConfigSchema } from '../schemas.js';

type EnvSource = Record<string, string | undefined>;

/**
 * Environment variables read by {@link loadClientProfileConfigFromEnv}
 */
export const CLIENT_PROFILE_ENV_VARS = {
  clientId: 'OAUTH_CLIENT_ID',
  clientSecret: 'OAUTH_CLIENT_SECRET',
  site: 'OAUTH_SITE',
  authorizePath: 'OAUTH_AUTHORIZE_PATH',
  accessTokenPath: 'OAUTH_TOKEN_PATH',
  redirectUri: 'OAUTH_REDIRECT_URI',
  scope: 'OAUTH_SCOPE',
  referer: 'OAUTH_REFERER',
  tokenScheme: 'OAUTH_TOKEN_SCHEME',
} as const satisfies Partial<Record<keyof ClientProfileSettings, string>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolves `${VAR}` references in a plain config object, then validates and
 * normalizes it.
 *
 * @param input - Config as read from a file or built by hand
 * @param envSource - Variables for reference resolution, defaults to process.env
 * @returns Settings ready for `new ClientProfile(...)`
 * @throws ConfigurationError when a reference cannot be resolved or validation fails
 * @example
 * ```typescript
 * const settings = resolveClientProfileConfig({
 *   clientId: '${OAUTH_CLIENT_ID}',
 *   clientSecret: '${OAUTH_CLIENT_SECRET}',
 *   site: 'https://auth.example.com',
 *   tokenUrl: '/oauth/v2/token',
 * });
 * const profile = new ClientProfile({ ...settings, autoSave });
 * ```
 * @public
 * @see {@link ClientProfile}
 */
export function resolveClientProfileConfig(
  input: unknown,
  envSource?: EnvSource,
): ClientProfileSettings {
  let resolved: unknown = input;
  if (isRecord(input)) {
    try {
      resolved = resolveConfigFields(input, CLIENT_PROFILE_STRING_FIELDS, envSource);
    } catch (error) {
      if (error instanceof EnvironmentResolutionError) {
        throw new ConfigurationError(error.message, error);
      }
      throw error;
    }
  }

  const result = ClientProfileConfigSchema.safeParse(resolved);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new ConfigurationError(`Invalid client profile config: ${detail}`);
  }

  return result.data;
}

/**
 * Builds client profile settings from `OAUTH_*` environment variables.
 * Unset variables are left out so the profile defaults apply.
 * @param env - Defaults to process.env
 * @public
 */
export function loadClientProfileConfigFromEnv(
  env: EnvSource = process.env,
): ClientProfileSettings {
  const config: Record<string, string> = {};
  for (const [field, variable] of Object.entries(CLIENT_PROFILE_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      config[field] = value;
    }
  }
  return resolveClientProfileConfig(config, env);
}
