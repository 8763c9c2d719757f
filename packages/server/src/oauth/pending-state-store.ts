import { generateState } from '@tokenwright/auth';
import { logEvent } from '@tokenwright/core';

/** Authorization requests older than this are refused on callback */
export const DEFAULT_STATE_EXPIRY_MS = 10 * 60 * 1000;

/**
 * Authorization request waiting for its callback
 */
export interface PendingAuthorization {
  sessionId: string;
  createdAt: number;
}

/**
 * Issues `state` values and remembers which session asked for them.
 * Each state can be consumed once.
 */
export class PendingStateStore {
  private readonly pending = new Map<string, PendingAuthorization>();

  public constructor(private readonly stateExpiryMs: number = DEFAULT_STATE_EXPIRY_MS) {}

  public create(sessionId: string, now: number = Date.now()): string {
    this.cleanupExpired(now);

    const state = generateState();
    this.pending.set(state, { sessionId, createdAt: now });
    return state;
  }

  /**
   * Removes and returns the pending authorization for `state`, unless it is
   * unknown or has expired.
   */
  public consume(state: string, now: number = Date.now()): PendingAuthorization | undefined {
    const pending = this.pending.get(state);
    if (!pending) {
      return undefined;
    }

    this.pending.delete(state);
    if (now - pending.createdAt > this.stateExpiryMs) {
      logEvent('info', 'server:state_expired', { sessionId: pending.sessionId });
      return undefined;
    }
    return pending;
  }

  /**
   * @returns Number of states dropped
   */
  public cleanupExpired(now: number = Date.now()): number {
    let removed = 0;
    for (const [state, pending] of this.pending) {
      if (now - pending.createdAt > this.stateExpiryMs) {
        this.pending.delete(state);
        removed++;
      }
    }
    return removed;
  }

  public get size(): number {
    return this.pending.size;
  }
}
