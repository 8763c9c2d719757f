/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (bundled with pino) for path-based redaction of token
 * material, client secrets and authorization codes.
 */

import pino from 'pino';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Reads the log level from TOKENWRIGHT_LOG_LEVEL.
 * Unknown or missing values fall back to 'silent'.
 * @param value - Raw level name, defaults to the environment variable
 * @public
 */
export function resolveLogLevel(
  value: string | undefined = process.env.TOKENWRIGHT_LOG_LEVEL,
): pino.LevelWithSilent {
  const normalized = (value ?? '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'silent';
}

/**
 * Redaction paths shared by the root logger and its tests.
 * Events are logged as `{ event, data }`, so most secrets sit one level deep.
 * @public
 */
export const REDACT_PATHS = [
  // OAuth wire names
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_secret',
  '*.client_secret',
  'code',
  '*.code',
  'state',
  '*.state',

  // Client-side field names
  '*.accessToken',
  '*.refreshToken',
  '*.clientSecret',
  'data.*.accessToken',
  'data.*.refreshToken',
  'data.*.clientSecret',

  // Headers
  'authorization',
  '*.authorization',
  '*.Authorization',
  '*.headers.authorization',
  '*.headers.Authorization',

  // Generic
  'password',
  '*.password',
  '*.secret',
  'token',
  '*.token',
];

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * Silent unless TOKENWRIGHT_LOG_LEVEL selects a level; the level can also be
 * changed at runtime.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ access_token: 'secret' }); // Logs: { access_token: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger = pino({
  name: 'tokenwright',
  level: resolveLogLevel(),
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
    remove: false, // Keep the keys, just redact values
  },
  serializers: {
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
