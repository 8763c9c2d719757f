import { logEvent } from '@tokenwright/core';
import { AutoSaveError } from '../errors/index.js';
import type { AccessToken } from './access-token.js';
import type { ClientProfile } from './client-profile.js';

/**
 * Runs the profile's auto-save hook after each successful token mutation.
 */
export class ChangeNotifier {
  /**
   * Awaits the hook once. Without a hook this is a no-op.
   * @throws AutoSaveError wrapping whatever the hook threw; the token keeps its new values
   */
  public async notify(profile: ClientProfile, token: AccessToken): Promise<void> {
    const hook = profile.autoSave;
    if (!hook) {
      return;
    }

    try {
      await hook(profile, token);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      logEvent('error', 'auth:auto_save_failed', {
        clientId: profile.clientId,
        sessionId: token.sessionId,
        reason: cause.message,
      });
      throw new AutoSaveError(token, cause);
    }

    logEvent('debug', 'auth:auto_save_completed', {
      clientId: profile.clientId,
      sessionId: token.sessionId,
    });
  }
}
