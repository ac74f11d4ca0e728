import { describe, it, expect, vi } from 'vitest';
import type { NodePgDatabase } from 'drizzle-orm/node-postgres';
import { PostgresSessionAdapter, orderSagaSessions } from '../index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type SessionRow = typeof orderSagaSessions.$inferSelect;

/**
 * Build a minimal Drizzle db mock that covers the query patterns used by
 * PostgresSessionAdapter.
 */
function makeDbMock(options: { rows?: SessionRow[]; deleted?: { key: string }[] } = {}) {
  const rows = options.rows ?? [];
  const deleted = options.deleted ?? [];

  const limit = vi.fn(async () => rows);
  const selectWhere = vi.fn(() => ({ limit }));
  const from = vi.fn(() => ({ where: selectWhere }));
  const select = vi.fn(() => ({ from }));

  const onConflictDoUpdate = vi.fn(async () => undefined);
  const values = vi.fn(() => ({ onConflictDoUpdate }));
  const insert = vi.fn(() => ({ values }));

  const updateWhere = vi.fn(async () => undefined);
  const set = vi.fn(() => ({ where: updateWhere }));
  const update = vi.fn(() => ({ set }));

  const returning = vi.fn(async () => deleted);
  const deleteWhere = vi.fn(() => Object.assign(Promise.resolve(undefined), { returning }));
  const del = vi.fn(() => ({ where: deleteWhere }));

  const db = { select, insert, update, delete: del } as unknown as NodePgDatabase;
  return { db, limit, insert, values, onConflictDoUpdate, update, set, del, deleteWhere, returning };
}

const NOW = new Date('2026-03-01T12:00:00.000Z');
const now = () => NOW;

// ---------------------------------------------------------------------------
// saveState
// ---------------------------------------------------------------------------

describe('PostgresSessionAdapter.saveState', () => {
  it('upserts the payload with an expiry ttl seconds from now', async () => {
    const mock = makeDbMock();
    const adapter = new PostgresSessionAdapter(mock.db, { now });

    await adapter.saveState('session:abc', '{"version":1}', 3600);

    const expiresAt = new Date('2026-03-01T13:00:00.000Z');
    expect(mock.insert).toHaveBeenCalledWith(orderSagaSessions);
    expect(mock.values).toHaveBeenCalledWith({
      key: 'session:abc',
      payload: '{"version":1}',
      expiresAt,
    });
    expect(mock.onConflictDoUpdate).toHaveBeenCalledWith({
      target: orderSagaSessions.key,
      set: { payload: '{"version":1}', expiresAt },
    });
  });
});

// ---------------------------------------------------------------------------
// loadState
// ---------------------------------------------------------------------------

describe('PostgresSessionAdapter.loadState', () => {
  it('returns undefined when no row exists for the key', async () => {
    const mock = makeDbMock();
    const adapter = new PostgresSessionAdapter(mock.db, { now });

    expect(await adapter.loadState('session:missing', 60)).toBeUndefined();
    expect(mock.limit).toHaveBeenCalledWith(1);
    expect(mock.update).not.toHaveBeenCalled();
  });

  it('returns the payload of a live row and pushes its expiry back', async () => {
    const mock = makeDbMock({
      rows: [
        {
          key: 'session:abc',
          payload: 'stored',
          expiresAt: new Date('2026-03-01T12:00:01.000Z'),
        },
      ],
    });
    const adapter = new PostgresSessionAdapter(mock.db, { now });

    expect(await adapter.loadState('session:abc', 60)).toBe('stored');
    expect(mock.update).toHaveBeenCalledWith(orderSagaSessions);
    expect(mock.set).toHaveBeenCalledWith({ expiresAt: new Date('2026-03-01T12:01:00.000Z') });
    expect(mock.del).not.toHaveBeenCalled();
  });

  it('treats a row at or past its expiry as absent and deletes it', async () => {
    const mock = makeDbMock({
      rows: [{ key: 'session:old', payload: 'stale', expiresAt: NOW }],
    });
    const adapter = new PostgresSessionAdapter(mock.db, { now });

    expect(await adapter.loadState('session:old', 60)).toBeUndefined();
    expect(mock.del).toHaveBeenCalledWith(orderSagaSessions);
    expect(mock.returning).not.toHaveBeenCalled();
    expect(mock.update).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// deleteState
// ---------------------------------------------------------------------------

describe('PostgresSessionAdapter.deleteState', () => {
  it('is true when a row was removed', async () => {
    const mock = makeDbMock({ deleted: [{ key: 'session:abc' }] });
    const adapter = new PostgresSessionAdapter(mock.db);

    expect(await adapter.deleteState('session:abc')).toBe(true);
    expect(mock.returning).toHaveBeenCalledWith({ key: orderSagaSessions.key });
  });

  it('is false when nothing matched', async () => {
    const mock = makeDbMock();
    const adapter = new PostgresSessionAdapter(mock.db);

    expect(await adapter.deleteState('session:none')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// orderSagaSessions – schema export
// ---------------------------------------------------------------------------

describe('orderSagaSessions schema', () => {
  it('maps to the order_saga_sessions columns', () => {
    expect(orderSagaSessions.key.name).toBe('session_key');
    expect(orderSagaSessions.payload.name).toBe('payload');
    expect(orderSagaSessions.expiresAt.name).toBe('expires_at');
    expect(orderSagaSessions.key.primary).toBe(true);
  });
});
