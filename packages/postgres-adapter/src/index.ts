import type { SessionStateAdapter } from '@order-saga/core';
import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';
import { eq } from 'drizzle-orm';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';

// ---------------------------------------------------------------------------
// Drizzle schema
// ---------------------------------------------------------------------------

/**
 * Drizzle table definition for stored sessions.
 * Export this if you need to include it in your own Drizzle schema object
 * (e.g. to run `drizzle-kit push` or `drizzle-kit generate`).
 */
export const orderSagaSessions = pgTable('order_saga_sessions', {
  /** Storage key (session prefix + session id). */
  key: text('session_key').primaryKey(),
  /** The encoded session record. */
  payload: text('payload').notNull(),
  /** Sliding expiry; pushed back on every read and write. */
  expiresAt: timestamp('expires_at', { withTimezone: true, mode: 'date' }).notNull(),
});

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

export interface PostgresSessionAdapterOptions {
  /** Clock used for expiry. Defaults to the current time. */
  now?: () => Date;
}

/**
 * PostgreSQL-backed implementation of {@link SessionStateAdapter}, powered by
 * Drizzle ORM.
 *
 * One row per session.  Expiry lives in `expires_at`: an expired row reads as
 * absent and is deleted on that read.
 *
 * ### Setup
 *
 * 1. Add `orderSagaSessions` to your Drizzle schema and run `drizzle-kit push`
 *    (or generate + apply a migration) to create the table.
 * 2. Pass your Drizzle `db` instance to `PostgresSessionAdapter`.
 *
 * @example
 * ```typescript
 * import { drizzle } from 'drizzle-orm/node-postgres';
 * import { Pool } from 'pg';
 * import { PostgresSessionAdapter } from '@order-saga/postgres-adapter';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const store = new SessionStore({ adapter: new PostgresSessionAdapter(drizzle(pool)) });
 * ```
 */
export class PostgresSessionAdapter implements SessionStateAdapter {
  private readonly _db: NodePgDatabase;
  private readonly _now: () => Date;

  constructor(db: NodePgDatabase, options: PostgresSessionAdapterOptions = {}) {
    this._db = db;
    this._now = options.now ?? (() => new Date());
  }

  /** @internal */
  private _expiry(ttlSeconds: number): Date {
    return new Date(this._now().getTime() + ttlSeconds * 1000);
  }

  async saveState(key: string, payload: string, ttlSeconds: number): Promise<void> {
    const expiresAt = this._expiry(ttlSeconds);
    await this._db
      .insert(orderSagaSessions)
      .values({ key, payload, expiresAt })
      .onConflictDoUpdate({
        target: orderSagaSessions.key,
        set: { payload, expiresAt },
      });
  }

  async loadState(key: string, ttlSeconds: number): Promise<string | undefined> {
    const rows = await this._db
      .select()
      .from(orderSagaSessions)
      .where(eq(orderSagaSessions.key, key))
      .limit(1);

    if (rows.length === 0) {
      return undefined;
    }

    const row = rows[0];
    if (row.expiresAt.getTime() <= this._now().getTime()) {
      await this._db.delete(orderSagaSessions).where(eq(orderSagaSessions.key, key));
      return undefined;
    }

    await this._db
      .update(orderSagaSessions)
      .set({ expiresAt: this._expiry(ttlSeconds) })
      .where(eq(orderSagaSessions.key, key));
    return row.payload;
  }

  async deleteState(key: string): Promise<boolean> {
    const removed = await this._db
      .delete(orderSagaSessions)
      .where(eq(orderSagaSessions.key, key))
      .returning({ key: orderSagaSessions.key });
    return removed.length > 0;
  }
}
