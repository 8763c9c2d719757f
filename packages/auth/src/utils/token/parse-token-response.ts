import type { TokenResponse, TransportResponse } from '@tokenwright/models';
import { z } from 'zod';
import { ProtocolError } from '../../errors/index.js';
import { parseErrorResponse } from '../error/parse-error-response.js';
import { parseTokenEndpointBody } from './parse-token-body.js';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value || undefined);

/**
 * Largest accepted `expires_in`, 100 years. Keeps `now + expires_in` well
 * inside the range a Date can hold.
 */
export const MAX_EXPIRES_IN_SECONDS = 100 * 365 * 24 * 60 * 60;

/**
 * Form bodies carry `expires_in` as text; JSON bodies may do the same.
 */
const expiresIn = z.preprocess(
  (value) => {
    if (value === null || value === '') return undefined;
    if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) return Number(value);
    return value;
  },
  z
    .number({ invalid_type_error: 'expires_in must be a number' })
    .finite()
    .int()
    .nonnegative()
    .max(MAX_EXPIRES_IN_SECONDS)
    .optional(),
);

const TokenEndpointResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: optionalText,
  expires_in: expiresIn,
  refresh_token: optionalText,
  scope: optionalText,
});

/**
 * Validates a token endpoint response and returns its token fields.
 *
 * A 2xx body that carries `error` instead of `access_token` is treated as an
 * error response; some servers answer grant failures with 200.
 * @param response - Raw token endpoint response
 * @throws ProtocolError for error statuses, unparsable bodies, a missing
 *   `access_token` or malformed optional fields
 * @public
 */
export function parseTokenResponse(response: TransportResponse): TokenResponse {
  if (response.status < 200 || response.status >= 300) {
    throw parseErrorResponse(response);
  }

  const fields = parseTokenEndpointBody(response);
  const accessToken = fields.access_token;

  if (accessToken === undefined || accessToken === null || accessToken === '') {
    if (typeof fields.error === 'string') {
      throw ProtocolError.fromErrorResponse(response.status, fields);
    }
    throw ProtocolError.missingAccessToken(response.status);
  }

  const result = TokenEndpointResponseSchema.safeParse(fields);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.message} at ${issue.path.join('.')}`)
      .join('; ');
    throw ProtocolError.invalidField(response.status, detail);
  }

  return result.data;
}
