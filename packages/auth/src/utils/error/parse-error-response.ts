import type { TransportResponse } from '@tokenwright/models';
import { ProtocolError } from '../../errors/index.js';
import { parseTokenEndpointBody } from '../token/parse-token-body.js';

/**
 * Turns a failed token endpoint response into a ProtocolError.
 *
 * The body is read for `error` / `error_description` when it parses; a body
 * that does not parse still yields an error carrying the status.
 * @param response - Non-2xx (or error-carrying) token endpoint response
 * @public
 */
export function parseErrorResponse(response: TransportResponse): ProtocolError {
  let fields: Record<string, unknown> | undefined;
  try {
    fields = parseTokenEndpointBody(response);
  } catch (error) {
    if (!(error instanceof ProtocolError)) throw error;
    fields = undefined;
  }
  return ProtocolError.fromErrorResponse(response.status, fields);
}
