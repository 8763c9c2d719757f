import type { AccessTokenRecord } from '@tokenwright/models';

/**
 * Interface for authentication providers
 * Responsible for providing authentication headers for HTTP requests
 */
export interface IAuthProvider {
  /**
   * Returns authentication headers for requests
   * @returns Promise resolving to header name-value pairs
   */
  getHeaders(): Promise<Record<string, string>>;

  /**
   * Checks if the current authentication state is valid
   * @returns Promise resolving to true if auth is valid, false otherwise
   */
  isValid(): Promise<boolean>;

  /**
   * Optional method for refreshing credentials
   */
  refresh?(): Promise<void>;
}

/**
 * Keyed persistence for token records, one record per session
 */
export interface ITokenStore {
  save(key: string, record: AccessTokenRecord): Promise<void>;

  /**
   * @returns The stored record, or null when the key is unknown
   */
  load(key: string): Promise<AccessTokenRecord | null>;

  delete(key: string): Promise<void>;
}
