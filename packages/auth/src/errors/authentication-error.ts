/**
 * Standard OAuth2 error codes as defined in RFC 6749
 */
export enum OAuth2ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  INVALID_CLIENT = 'invalid_client',
  INVALID_GRANT = 'invalid_grant',
  UNAUTHORIZED_CLIENT = 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type',
  INVALID_SCOPE = 'invalid_scope',
  ACCESS_DENIED = 'access_denied',
  UNSUPPORTED_RESPONSE_TYPE = 'unsupported_response_type',
  SERVER_ERROR = 'server_error',
  TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable',
}

/**
 * Client-side error codes beyond the OAuth2 set
 */
export enum AuthErrorCode {
  CONFIGURATION_ERROR = 'configuration_error',
  NETWORK_ERROR = 'network_error',
  INVALID_RESPONSE = 'invalid_response',
  AUTO_SAVE_FAILED = 'auto_save_failed',
  TOKEN_EXPIRED = 'token_expired',
  UNKNOWN_ERROR = 'unknown_error',
}

export type ErrorCode = OAuth2ErrorCode | AuthErrorCode;

/**
 * Narrows a server-supplied `error` value to a standard OAuth2 code.
 * @param value - Raw `error` field from a token endpoint body
 * @public
 */
export function toOAuth2ErrorCode(value: unknown): OAuth2ErrorCode | undefined {
  return Object.values(OAuth2ErrorCode).find((code) => code === value);
}

/**
 * Base class of every error this client raises.
 * Messages are scrubbed of anything that looks like token material.
 */
export class AuthenticationError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: ErrorCode = AuthErrorCode.UNKNOWN_ERROR,
    cause?: Error,
  ) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Sanitizes error messages to prevent sensitive data exposure
   */
  private static sanitizeMessage(message: string): string {
    return message
      .replace(/\b[a-zA-Z0-9+/]{32,}={0,2}\b/g, '[REDACTED_TOKEN]') // Base64-like tokens
      .replace(/\b(Bearer|OAuth)\s+[a-zA-Z0-9._~+/-]+=*/gi, '$1 [REDACTED]') // Header values
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]') // URL params
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bcode[=:]\s*[^\s&]+/gi, 'code=[REDACTED]');
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      cause: this.cause?.message,
    };
  }
}
