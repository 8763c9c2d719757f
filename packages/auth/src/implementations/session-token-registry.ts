import { logEvent } from '@tokenwright/core';
import type { AccessToken } from './access-token.js';

/**
 * Process-local map from session id to that session's live token.
 * Owned by the caller; nothing here persists.
 */
export class SessionTokenRegistry {
  private readonly tokens = new Map<string, AccessToken>();

  /**
   * Associates `token` with `sessionId`, replacing any previous token.
   */
  public register(sessionId: string, token: AccessToken): void {
    this.tokens.set(sessionId, token);
    token.sessionId = sessionId;
    logEvent('debug', 'auth:session_registered', { sessionId });
  }

  public get(sessionId: string): AccessToken | undefined {
    return this.tokens.get(sessionId);
  }

  public has(sessionId: string): boolean {
    return this.tokens.has(sessionId);
  }

  public remove(sessionId: string): boolean {
    const removed = this.tokens.delete(sessionId);
    if (removed) {
      logEvent('debug', 'auth:session_removed', { sessionId });
    }
    return removed;
  }

  /**
   * Drops tokens that are expired at `now` and cannot refresh.
   * @returns Session ids that were removed
   */
  public prune(now: Date = new Date()): string[] {
    const removed: string[] = [];
    for (const [sessionId, token] of this.tokens) {
      if (token.isExpired(now) && !token.canRefresh()) {
        this.tokens.delete(sessionId);
        removed.push(sessionId);
      }
    }
    if (removed.length > 0) {
      logEvent('info', 'auth:sessions_pruned', { count: removed.length });
    }
    return removed;
  }

  public get size(): number {
    return this.tokens.size;
  }
}
