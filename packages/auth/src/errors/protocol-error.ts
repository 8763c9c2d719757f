import {
  AuthenticationError,
  AuthErrorCode,
  type ErrorCode,
  OAuth2ErrorCode,
  toOAuth2ErrorCode,
} from './authentication-error.js';

export interface ProtocolErrorDetails {
  status?: number;
  oauthError?: string;
  errorDescription?: string;
  code?: ErrorCode;
  cause?: Error;
}

/**
 * The token endpoint answered, but not with a usable token: a non-2xx status,
 * a body that does not parse, or a success body without `access_token`.
 */
export class ProtocolError extends AuthenticationError {
  public readonly status?: number;
  public readonly oauthError?: string;
  public readonly errorDescription?: string;

  public constructor(message: string, details: ProtocolErrorDetails = {}) {
    super(message, details.code ?? AuthErrorCode.INVALID_RESPONSE, details.cause);
    this.name = 'ProtocolError';
    this.status = details.status;
    this.oauthError = details.oauthError;
    this.errorDescription = details.errorDescription;
  }

  /**
   * Builds the error for an OAuth error body, or for an error status whose
   * body carried nothing useful.
   * @param status - HTTP status of the token endpoint response
   * @param body - Parsed body fields, when the body parsed at all
   */
  public static fromErrorResponse(
    status: number,
    body?: Record<string, unknown>,
  ): ProtocolError {
    const oauthError = typeof body?.error === 'string' ? body.error : undefined;
    const errorDescription =
      typeof body?.error_description === 'string' ? body.error_description : undefined;

    const code =
      toOAuth2ErrorCode(oauthError) ??
      (status >= 500 ? OAuth2ErrorCode.SERVER_ERROR : AuthErrorCode.INVALID_RESPONSE);

    let message = `Token endpoint returned HTTP ${status}`;
    if (oauthError) {
      message += `: ${oauthError}`;
    }
    if (errorDescription) {
      message += ` (${errorDescription})`;
    }

    return new ProtocolError(message, { status, oauthError, errorDescription, code });
  }

  public static unparsableBody(status: number, cause?: Error): ProtocolError {
    return new ProtocolError(`Token endpoint response could not be parsed (HTTP ${status})`, {
      status,
      cause,
    });
  }

  public static missingAccessToken(status: number): ProtocolError {
    return new ProtocolError('Token endpoint response missing access_token field', {
      status,
      code: OAuth2ErrorCode.INVALID_REQUEST,
    });
  }

  public static invalidField(status: number, detail: string): ProtocolError {
    return new ProtocolError(`Token endpoint response is invalid: ${detail}`, { status });
  }

  public override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      oauthError: this.oauthError,
      errorDescription: this.errorDescription,
    };
  }
}
