/**
 * Random values for the authorization round trip
 */
import { randomBytes } from 'crypto';

/**
 * Encodes a buffer to URL-safe base64 format per RFC 4648 Section 5.
 * @internal
 */
export function base64URLEncode(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');
}

/**
 * Generates an unguessable `state` value (16 random bytes, URL-safe, 22 characters).
 * @public
 */
export function generateState(): string {
  return base64URLEncode(randomBytes(16));
}
