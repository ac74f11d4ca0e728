import { randomBytes } from 'node:crypto';
import type { Logger, UserSession } from './types.js';
import { SessionNotFoundError } from './types.js';
import type { SessionStateAdapter } from './persistence.js';
import { InMemoryAdapter } from './persistence.js';
import { decodeSession, encodeSession, SerializationError } from './serialization.js';
import {
  createDefaultBalances,
  createDefaultInventory,
  createDefaultOrders,
  createDefaultSagaTransactions,
} from './seed.js';

/** One hour of inactivity. */
export const DEFAULT_SESSION_TIMEOUT_SECONDS = 3600;

export const DEFAULT_SESSION_KEY_PREFIX = 'session:';

/**
 * Options for {@link SessionStore}.
 */
export interface SessionStoreOptions {
  /** Backing storage. Defaults to a fresh {@link InMemoryAdapter}. */
  adapter?: SessionStateAdapter;
  /**
   * Seconds of inactivity after which a session is discarded.
   * @default 3600
   */
  sessionTimeoutSeconds?: number;
  /**
   * Prefix applied to every session id to form the storage key.
   * @default "session:"
   */
  keyPrefix?: string;
  logger?: Logger;
  /** Clock in epoch milliseconds, used for `createdAt`. Defaults to `Date.now`. */
  now?: () => number;
}

/**
 * Owns the per-user sessions and their isolated resource maps.
 *
 * Expiration is sliding: every successful {@link get} and every {@link save}
 * pushes the session's expiry back by the configured timeout.  Unknown,
 * expired and corrupted sessions all read as absent so callers can create a
 * new one transparently.
 *
 * @example
 * ```typescript
 * const store = new SessionStore({ adapter: new InMemoryAdapter() });
 * const session = await store.getOrCreate(cookieSessionId);
 * ```
 */
export class SessionStore {
  private readonly _adapter: SessionStateAdapter;
  private readonly _timeoutSeconds: number;
  private readonly _keyPrefix: string;
  private readonly _logger: Logger | undefined;
  private readonly _now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this._adapter = options.adapter ?? new InMemoryAdapter();
    this._timeoutSeconds = options.sessionTimeoutSeconds ?? DEFAULT_SESSION_TIMEOUT_SECONDS;
    this._keyPrefix = options.keyPrefix ?? DEFAULT_SESSION_KEY_PREFIX;
    this._logger = options.logger;
    this._now = options.now ?? Date.now;
  }

  get sessionTimeoutSeconds(): number {
    return this._timeoutSeconds;
  }

  /** @internal */
  private _buildKey(sessionId: string): string {
    return `${this._keyPrefix}${sessionId}`;
  }

  /**
   * Allocate a new session with an unguessable id and seeded resources, and
   * persist it.
   */
  async create(): Promise<UserSession> {
    const session: UserSession = {
      sessionId: randomBytes(32).toString('base64url'),
      createdAt: this._now(),
      orders: createDefaultOrders(),
      inventory: createDefaultInventory(),
      balances: createDefaultBalances(),
      sagaTransactions: createDefaultSagaTransactions(),
    };
    await this.save(session);
    this._logger?.info('session:create', { sessionId: session.sessionId });
    return session;
  }

  /**
   * Look up a live session and refresh its last-access time.
   * Returns `undefined` for unknown, expired or corrupted sessions; a
   * corrupted record is deleted.
   */
  async get(sessionId: string): Promise<UserSession | undefined> {
    const key = this._buildKey(sessionId);
    const payload = await this._adapter.loadState(key, this._timeoutSeconds);
    if (payload === undefined) {
      return undefined;
    }
    try {
      return decodeSession(payload);
    } catch (err) {
      if (!(err instanceof SerializationError)) {
        throw err;
      }
      this._logger?.warn('session:corrupt', { sessionId, error: err.message });
      await this._adapter.deleteState(key);
      return undefined;
    }
  }

  /**
   * Resolve `sessionId` if it names a live session, otherwise create a new
   * one.  This is the entry point used when handling a request.
   */
  async getOrCreate(sessionId?: string | null): Promise<UserSession> {
    if (sessionId) {
      const session = await this.get(sessionId);
      if (session) {
        return session;
      }
    }
    return this.create();
  }

  /**
   * Like {@link get}, but an absent session is an error.
   * @throws {@link SessionNotFoundError}
   */
  async require(sessionId: string): Promise<UserSession> {
    const session = await this.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /** Persist the whole session, overwriting the stored record. */
  async save(session: UserSession): Promise<void> {
    await this._adapter.saveState(
      this._buildKey(session.sessionId),
      encodeSession(session),
      this._timeoutSeconds,
    );
  }

  /**
   * Replace all four resource maps with fresh seed data, keeping the session
   * id and creation time, and persist the result.
   *
   * @returns The reset session, or `undefined` if the session does not exist.
   */
  async reset(sessionId: string): Promise<UserSession | undefined> {
    const session = await this.get(sessionId);
    if (!session) {
      return undefined;
    }
    session.orders = createDefaultOrders();
    session.inventory = createDefaultInventory();
    session.balances = createDefaultBalances();
    session.sagaTransactions = createDefaultSagaTransactions();
    await this.save(session);
    this._logger?.info('session:reset', { sessionId });
    return session;
  }

  /**
   * Remove a session entirely.
   * @returns `true` when a stored session was removed.
   */
  async delete(sessionId: string): Promise<boolean> {
    return this._adapter.deleteState(this._buildKey(sessionId));
  }
}
