import type { ApiKeyRecord } from './types';

/**
 * Durable mapping from key token to key record. Implementations throw
 * `DuplicateKeyError` from `insert`, `KeyNotFoundError` from targeted updates
 * of a missing record and `StoreUnavailableError` when the backend cannot be
 * reached.
 */
export abstract class KeyStore {
  abstract insert(record: ApiKeyRecord): Promise<ApiKeyRecord>;

  abstract findByKey(key: string): Promise<ApiKeyRecord | null>;

  /** Newest record carrying `name`. */
  abstract findByName(name: string): Promise<ApiKeyRecord | null>;

  abstract findActiveByKey(key: string): Promise<ApiKeyRecord | null>;

  abstract updateActiveFlag(key: string, active: boolean): Promise<void>;

  /** Atomically adds one to `usage` and returns the new value. */
  abstract incrementUsage(key: string): Promise<number>;

  /** Deactivates every active record named `name`; returns how many changed. */
  abstract revokeByName(name: string): Promise<number>;

  /** Deletes every record whose key or name equals `token`. */
  abstract deleteByKeyOrName(token: string): Promise<number>;

  /** Newest first. */
  abstract listAll(): Promise<ApiKeyRecord[]>;
}
