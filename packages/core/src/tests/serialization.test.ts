import { describe, it, expect } from 'vitest';
import {
  SESSION_FORMAT_VERSION,
  SerializationError,
  decodeSession,
  encodeSession,
  toSessionRecord,
} from '../serialization.js';
import type { UserSession } from '../types.js';

function makeSession(): UserSession {
  return {
    sessionId: 'abc',
    createdAt: 1_700_000_000_000,
    orders: {
      'o-1': {
        id: 'o-1',
        userId: 'user_3',
        productId: 'product_1',
        quantity: 3,
        amount: 30,
        status: 'failed',
      },
    },
    inventory: { product_1: 100 },
    balances: { user_3: 200 },
    sagaTransactions: {
      's-1': {
        id: 's-1',
        orderId: 'o-1',
        steps: [
          { name: 'validate_order', status: 'completed' },
          { name: 'reserve_inventory', status: 'compensated' },
          { name: 'ship_order', status: 'failed', errorMessage: 'Shipping address invalid' },
          { name: 'later', status: 'pending' },
        ],
        status: 'failed',
      },
    },
  };
}

describe('toSessionRecord', () => {
  it('writes the stored layout with snake_case keys and a version', () => {
    expect(toSessionRecord(makeSession())).toEqual({
      version: 1,
      session_id: 'abc',
      created_at: 1_700_000_000_000,
      orders: {
        'o-1': {
          id: 'o-1',
          user_id: 'user_3',
          product_id: 'product_1',
          quantity: 3,
          amount: 30,
          status: 'failed',
        },
      },
      inventory: { product_1: 100 },
      balances: { user_3: 200 },
      saga_transactions: {
        's-1': {
          id: 's-1',
          order_id: 'o-1',
          steps: [
            { name: 'validate_order', status: 'completed', error_message: null },
            { name: 'reserve_inventory', status: 'compensated', error_message: null },
            { name: 'ship_order', status: 'failed', error_message: 'Shipping address invalid' },
            { name: 'later', status: 'pending', error_message: null },
          ],
          status: 'failed',
        },
      },
    });
  });

  it('copies the resource maps', () => {
    const session = makeSession();
    const record = toSessionRecord(session);
    record.inventory.product_1 = 0;
    expect(session.inventory.product_1).toBe(100);
  });
});

describe('encodeSession / decodeSession', () => {
  it('restores the session exactly', () => {
    const session = makeSession();
    expect(decodeSession(encodeSession(session))).toEqual(session);
  });

  it('omits errorMessage on steps that have none', () => {
    const decoded = decodeSession(encodeSession(makeSession()));
    expect('errorMessage' in decoded.sagaTransactions['s-1'].steps[0]).toBe(false);
  });

  it('keeps map insertion order', () => {
    const session = makeSession();
    session.orders['o-2'] = { ...session.orders['o-1'], id: 'o-2' };
    session.orders['o-0'] = { ...session.orders['o-1'], id: 'o-0' };

    const decoded = decodeSession(encodeSession(session));

    expect(Object.keys(decoded.orders)).toEqual(['o-1', 'o-2', 'o-0']);
  });

  it('keeps a rejected order with a non-finite or fractional quantity readable', () => {
    const session = makeSession();
    session.orders['o-1'].quantity = Number.NaN;
    session.orders['o-1'].amount = Number.POSITIVE_INFINITY;
    session.orders['o-2'] = { ...session.orders['o-1'], id: 'o-2', quantity: 1.5, amount: 30 };

    const decoded = decodeSession(encodeSession(session));

    expect(decoded.orders['o-1'].quantity).toBeNaN();
    expect(decoded.orders['o-1'].amount).toBeNaN();
    expect(decoded.orders['o-2'].quantity).toBe(1.5);
  });

  it('accepts records that leave error_message out', () => {
    const record = toSessionRecord(makeSession());
    delete record.saga_transactions['s-1'].steps[0].error_message;

    const decoded = decodeSession(JSON.stringify(record));

    expect(decoded.sagaTransactions['s-1'].steps[0]).toEqual({
      name: 'validate_order',
      status: 'completed',
    });
  });
});

describe('decodeSession – failures', () => {
  it('rejects invalid JSON', () => {
    expect(() => decodeSession('{oops')).toThrowError(
      'SerializationError: session payload is not valid JSON',
    );
  });

  it('rejects a record from another format version', () => {
    const record = { ...toSessionRecord(makeSession()), version: SESSION_FORMAT_VERSION + 1 };
    expect(() => decodeSession(JSON.stringify(record))).toThrow(SerializationError);
  });

  it('names the offending path', () => {
    const record = toSessionRecord(makeSession());
    const broken = {
      ...record,
      orders: { 'o-1': { ...record.orders['o-1'], status: 'shipped' } },
    };

    const error = (() => {
      try {
        decodeSession(JSON.stringify(broken));
      } catch (err) {
        return err;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(SerializationError);
    expect(String(error)).toContain('orders.o-1.status');
  });

  it('keeps the underlying error as cause', () => {
    try {
      decodeSession('nope');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SerializationError);
      expect(err).toHaveProperty('cause');
      expect(err instanceof SerializationError && err.cause instanceof SyntaxError).toBe(true);
    }
  });
});
