import { TransportError } from '@tokenwright/core';
import { AuthenticationError, AuthErrorCode } from './authentication-error.js';

/**
 * The transport could not complete an exchange (connect, timeout, reset)
 */
export class NetworkError extends AuthenticationError {
  public readonly isRetryable: boolean;

  public constructor(message: string, cause?: Error, isRetryable = true) {
    super(`Network error during authentication: ${message}`, AuthErrorCode.NETWORK_ERROR, cause);
    this.name = 'NetworkError';
    this.isRetryable = isRetryable;
  }

  /**
   * Wraps whatever an HttpTransport rejected with.
   * @param error - Rejection value
   */
  public static fromTransportError(error: unknown): NetworkError {
    if (error instanceof NetworkError) {
      return error;
    }
    if (error instanceof TransportError) {
      return new NetworkError(error.message, error, error.isRetryable);
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return new NetworkError(cause.message, cause);
  }
}
