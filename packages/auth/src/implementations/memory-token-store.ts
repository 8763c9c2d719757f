import type { AccessTokenRecord } from '@tokenwright/models';
import { type ITokenStore, logEvent } from '@tokenwright/core';

/**
 * In-memory ITokenStore keyed by session id.
 * Contents are lost on restart; records are copied in and out.
 */
export class MemoryTokenStore implements ITokenStore {
  private readonly records = new Map<string, AccessTokenRecord>();

  public async save(key: string, record: AccessTokenRecord): Promise<void> {
    if (!key) {
      throw new Error('Token store key is required');
    }
    this.records.set(key, { ...record });

    logEvent('debug', 'auth:token_stored', {
      sessionId: key,
      expiresAt: record.expiresAt,
      hasRefreshToken: Boolean(record.refreshToken),
    });
  }

  public async load(key: string): Promise<AccessTokenRecord | null> {
    const record = this.records.get(key);
    return record ? { ...record } : null;
  }

  public async delete(key: string): Promise<void> {
    if (this.records.delete(key)) {
      logEvent('debug', 'auth:token_deleted', { sessionId: key });
    }
  }

  public get size(): number {
    return this.records.size;
  }
}
