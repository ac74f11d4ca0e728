import type { Order, SagaTransaction } from './types.js';

// Fresh objects on every call: sessions must never share a map.

export function createDefaultInventory(): Record<string, number> {
  return { product_1: 100, product_2: 50, product_3: 25 };
}

export function createDefaultBalances(): Record<string, number> {
  return { user_1: 1000.0, user_2: 500.0, user_3: 200.0 };
}

export function createDefaultOrders(): Record<string, Order> {
  return {};
}

export function createDefaultSagaTransactions(): Record<string, SagaTransaction> {
  return {};
}
