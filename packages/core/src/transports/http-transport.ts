import type { OutgoingRequest, TransportResponse } from '@tokenwright/models';

/**
 * Sends a request and reads the full response.
 *
 * Implementations reject with a TransportError when no response could be
 * obtained (connection failure, timeout). Any HTTP status resolves.
 */
export interface HttpTransport {
  send(request: OutgoingRequest): Promise<TransportResponse>;
}
