import type { OutgoingRequest, TransportResponse } from '@tokenwright/models';
import type { HttpTransport } from '@tokenwright/core';
import { ClientProfile, type ClientProfileConfig } from '../implementations/client-profile.js';
import { TokenExchanger } from '../implementations/token-exchanger.js';
import { AccessToken, type AccessTokenInit } from '../implementations/access-token.js';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

export type StubReply =
  | TransportResponse
  | Error
  | ((request: OutgoingRequest) => TransportResponse | Promise<TransportResponse>);

/**
 * In-process HttpTransport. Replies are consumed in order; every request is recorded.
 */
export class StubTransport implements HttpTransport {
  public readonly requests: OutgoingRequest[] = [];
  private readonly replies: StubReply[] = [];

  public enqueue(...replies: StubReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  public async send(request: OutgoingRequest): Promise<TransportResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error(`No stubbed reply for ${request.method} ${request.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(request) : reply;
  }
}

export function jsonResponse(body: unknown, status = 200): TransportResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function formResponse(body: string, status = 200): TransportResponse {
  return {
    status,
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body,
  };
}

export function textResponse(body: string, status: number, contentType = 'text/html'): TransportResponse {
  return { status, headers: { 'content-type': contentType }, body };
}

/**
 * Resolves only when `release` is called; used to hold a refresh in flight.
 */
export function deferredReply(response: TransportResponse): {
  reply: StubReply;
  release: () => void;
} {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  return {
    reply: async () => {
      await gate;
      return response;
    },
    release: () => release(),
  };
}

export function formOf(request: OutgoingRequest | undefined): URLSearchParams {
  return new URLSearchParams(request?.body ?? '');
}

export function createProfile(overrides: Partial<ClientProfileConfig> = {}): ClientProfile {
  return new ClientProfile({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    site: 'https://auth.example.com',
    redirectUri: 'https://app.example.com/callback',
    ...overrides,
  });
}

export function createExchanger(
  profileOverrides: Partial<ClientProfileConfig> = {},
  transport: StubTransport = new StubTransport(),
): { profile: ClientProfile; exchanger: TokenExchanger; transport: StubTransport } {
  const profile = createProfile(profileOverrides);
  return { profile, exchanger: new TokenExchanger(profile, { transport }), transport };
}

export function createToken(exchanger: TokenExchanger, init: Partial<AccessTokenInit> = {}): AccessToken {
  return new AccessToken(exchanger, {
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    ...init,
  });
}
