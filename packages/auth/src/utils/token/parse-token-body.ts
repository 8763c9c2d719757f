import type { TransportResponse } from '@tokenwright/models';
import { ProtocolError } from '../../errors/index.js';

const FORM_BODY = /^[^=&\s]+=[^&]*(&[^=&\s]+=[^&]*)*$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes a token endpoint body into its fields.
 *
 * JSON is used when the content type says so or the body is an object literal;
 * otherwise a `key=value&...` body is read as form-encoded. Anything else
 * (HTML error pages, empty bodies) is rejected.
 * @param response - Token endpoint response
 * @throws ProtocolError when the body is neither JSON nor form-encoded
 * @internal
 */
export function parseTokenEndpointBody(response: TransportResponse): Record<string, unknown> {
  const contentType = response.headers['content-type'] ?? '';
  const text = response.body.trim();

  if (contentType.includes('json') || text.startsWith('{')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw ProtocolError.unparsableBody(
        response.status,
        error instanceof Error ? error : undefined,
      );
    }
    if (!isRecord(parsed)) {
      throw ProtocolError.unparsableBody(response.status);
    }
    return parsed;
  }

  if (FORM_BODY.test(text)) {
    return Object.fromEntries(new URLSearchParams(text));
  }

  throw ProtocolError.unparsableBody(response.status);
}
