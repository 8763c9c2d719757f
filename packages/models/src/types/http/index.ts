export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD';

/**
 * Request description handed to an HttpTransport. Decorators return new
 * instances instead of mutating these.
 */
export interface OutgoingRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Fully read response returned by an HttpTransport
 */
export interface TransportResponse {
  status: number;
  statusText?: string;
  /** Header names are lower-cased */
  headers: Record<string, string>;
  body: string;
}
