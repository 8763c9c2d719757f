import type { OutgoingRequest, TransportResponse } from '@tokenwright/models';
import type { HttpTransport } from '../http-transport.js';
import { TransportError } from '../errors/transport-error.js';
import { logEvent } from '../../logger.js';

export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

export interface FetchHttpTransportOptions {
  /** Abort the request after this many milliseconds (default 30000) */
  timeoutMs?: number;
  /** Replacement for the global fetch, e.g. an in-process app's request handler */
  fetch?: FetchFunction;
}

export const DEFAULT_TRANSPORT_TIMEOUT_MS = 30_000;

/**
 * HttpTransport backed by the WHATWG fetch API.
 *
 * Redirects are not followed; a token endpoint answering with a redirect is
 * reported to the caller as that status.
 * @example
 * ```typescript
 * const transport = new FetchHttpTransport({ timeoutMs: 5000 });
 * const response = await transport.send({
 *   method: 'GET',
 *   url: 'https://api.example.com/me',
 *   headers: { Accept: 'application/json' },
 * });
 * ```
 * @public
 */
export class FetchHttpTransport implements HttpTransport {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFunction;

  public constructor(options: FetchHttpTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TRANSPORT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  public async send(request: OutgoingRequest): Promise<TransportResponse> {
    try {
      new URL(request.url);
    } catch (error) {
      throw TransportError.invalidUrl(
        request.url,
        error instanceof Error ? error : undefined,
      );
    }

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        redirect: 'manual',
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      const body = await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body,
      };
    } catch (error) {
      const transportError = TransportError.fromFetchError(error, this.timeoutMs);
      logEvent('warn', 'transport:request_failed', {
        method: request.method,
        url: new URL(request.url).origin,
        errorCode: transportError.code,
      });
      throw transportError;
    }
  }
}
