import { AuthenticationError, AuthErrorCode } from './authentication-error.js';

/**
 * Invalid client profile, or an operation the current token cannot perform
 */
export class ConfigurationError extends AuthenticationError {
  public constructor(message: string, cause?: Error) {
    super(message, AuthErrorCode.CONFIGURATION_ERROR, cause);
    this.name = 'ConfigurationError';
  }

  public static missingRefreshToken(): ConfigurationError {
    return new ConfigurationError('Cannot refresh access token: no refresh token');
  }

  public static missingCode(): ConfigurationError {
    return new ConfigurationError('Authorization code is required');
  }

  /**
   * The token expired and cannot refresh itself; the caller has to restart
   * the authorization code flow.
   */
  public static expiredWithoutRefreshToken(): ConfigurationError {
    return new ConfigurationError(
      'Access token has expired and no refresh token is available',
    );
  }

  public static foreignToken(): ConfigurationError {
    return new ConfigurationError(
      'Access token was issued through a different client profile',
    );
  }
}
