import type { ITokenStore } from '@tokenwright/core';
import type { AccessToken } from '../implementations/access-token.js';
import type { AutoSaveHook } from '../implementations/client-profile.js';

/**
 * Picks the storage key for a token; undefined means it cannot be stored
 */
export type TokenKeyResolver = (token: AccessToken) => string | undefined;

const bySessionId: TokenKeyResolver = (token) => token.sessionId;

/**
 * Builds an auto-save hook that writes each changed token to `store` and then
 * marks it saved.
 * @param store - Destination store
 * @param keyOf - Key resolver, defaults to the token's sessionId
 * @example
 * ```typescript
 * const store = new MemoryTokenStore();
 * const profile = new ClientProfile({ ...settings, autoSave: createAutoSaveHook(store) });
 * ```
 * @public
 */
export function createAutoSaveHook(
  store: ITokenStore,
  keyOf: TokenKeyResolver = bySessionId,
): AutoSaveHook {
  return async (_profile, token) => {
    const key = keyOf(token);
    if (!key) {
      throw new Error('Cannot save token: no storage key');
    }
    await store.save(key, token.toJSON());
    token.markSaved();
  };
}
