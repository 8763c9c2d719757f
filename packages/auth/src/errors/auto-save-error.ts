import type { AccessToken } from '../implementations/access-token.js';
import { AuthenticationError, AuthErrorCode } from './authentication-error.js';

/**
 * The auto-save hook failed after a successful grant or refresh. The token is
 * already updated in memory and is available here so the caller can retry
 * persistence or discard it.
 */
export class AutoSaveError extends AuthenticationError {
  public readonly token: AccessToken;

  public constructor(token: AccessToken, cause: Error) {
    super(`Auto-save hook failed: ${cause.message}`, AuthErrorCode.AUTO_SAVE_FAILED, cause);
    this.name = 'AutoSaveError';
    this.token = token;
  }
}
