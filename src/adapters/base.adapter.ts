import { ApiKey, ApiKeyPage } from '../interfaces';

export interface CreateApiKeyData {
  name: string;
  clientId: string;
  keyHash: string;
  keyPrefix: string;
  expiresAt: Date | null;
}

/**
 * Decides, while the candidate row is locked, whether the presented secret
 * authenticates it. Returning `false` leaves the row untouched.
 */
export type LockedKeyCheck = (apiKey: ApiKey) => Promise<boolean>;

/**
 * Persistence contract for API key records. Implementations own transaction
 * boundaries and row locking.
 */
export interface IApiKeyAdapter {
  /**
   * Inserts a new active key. Violating one of the unique constraints
   * (hash, prefix, client id + name) raises `ApiKeyConflictException`.
   */
  create(data: CreateApiKeyData): Promise<ApiKey>;

  findById(id: string): Promise<ApiKey | null>;

  /**
   * Administrative lookup of the single key whose prefix starts with `prefix`.
   * Returns null when nothing or more than one key matches.
   */
  findByPrefix(prefix: string): Promise<ApiKey | null>;

  /**
   * One page ordered by creation time (newest first) plus the total number
   * of records, counted independently of the page.
   */
  list(skip: number, limit: number): Promise<ApiKeyPage>;

  /**
   * Locks the unique active key with the given lookup prefix, skipping it if
   * another transaction already holds the lock, runs `check` against it and,
   * when the check passes, records `usedAt` as its last use before the lock
   * is released.
   *
   * @returns The touched key, or null when no unlocked active key matched or
   * the check failed
   */
  validateAndTouch(keyPrefix: string, check: LockedKeyCheck, usedAt: Date): Promise<ApiKey | null>;

  /**
   * Marks the key inactive and stamps `revokedAt` in one conditional update
   * targeted by id.
   *
   * @returns true if a key with this id exists
   */
  revoke(id: string, revokedAt: Date): Promise<boolean>;

  count(): Promise<number>;
}
