/**
 * Backing storage for encoded sessions.
 * Implement this to plug in any storage backend (Redis, database, etc.).
 *
 * Every read and write applies the timeout to the whole record, so a record
 * expires `ttlSeconds` after it was last touched.
 *
 * @example
 * ```typescript
 * class RedisSessionAdapter implements SessionStateAdapter {
 *   async saveState(key: string, payload: string, ttlSeconds: number) { ... }
 *   async loadState(key: string, ttlSeconds: number) { ... }
 *   async deleteState(key: string) { ... }
 * }
 * ```
 */
export interface SessionStateAdapter {
  /**
   * Persist an encoded session under `key`, replacing any previous value.
   * @param key        - The storage key for the session.
   * @param payload    - The encoded session record.
   * @param ttlSeconds - Seconds of inactivity after which the record expires.
   */
  saveState(key: string, payload: string, ttlSeconds: number): Promise<void>;

  /**
   * Load the encoded session stored under `key` and push its expiry back to
   * `ttlSeconds` from now.  Resolves `undefined` when nothing is stored or
   * the record has expired.
   */
  loadState(key: string, ttlSeconds: number): Promise<string | undefined>;

  /**
   * Remove the record stored under `key`.
   * @returns `true` when a record was removed.
   */
  deleteState(key: string): Promise<boolean>;
}

export interface InMemoryAdapterOptions {
  /** Clock in epoch milliseconds. Defaults to `Date.now`. */
  now?: () => number;
}

interface StoredEntry {
  payload: string;
  expiresAt: number;
}

/**
 * Default in-memory implementation of {@link SessionStateAdapter}.
 * Suitable for single-process use and testing.
 * State is lost when the process exits.
 */
export class InMemoryAdapter implements SessionStateAdapter {
  private readonly _store = new Map<string, StoredEntry>();
  private readonly _now: () => number;

  constructor(options: InMemoryAdapterOptions = {}) {
    this._now = options.now ?? Date.now;
  }

  async saveState(key: string, payload: string, ttlSeconds: number): Promise<void> {
    this._store.set(key, { payload, expiresAt: this._now() + ttlSeconds * 1000 });
  }

  async loadState(key: string, ttlSeconds: number): Promise<string | undefined> {
    const entry = this._store.get(key);
    if (!entry) {
      return undefined;
    }
    const now = this._now();
    if (entry.expiresAt <= now) {
      this._store.delete(key);
      return undefined;
    }
    entry.expiresAt = now + ttlSeconds * 1000;
    return entry.payload;
  }

  async deleteState(key: string): Promise<boolean> {
    return this._store.delete(key);
  }

  /** Number of records currently held, expired or not. */
  get size(): number {
    return this._store.size;
  }
}
