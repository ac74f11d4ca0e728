export { createOrderSagaApp, createSessionBackend } from './app.js';
export type { OrderSagaApp, OrderSagaAppOptions, SessionBackend } from './app.js';
export * from '@order-saga/core';
export { RedisSessionAdapter } from '@order-saga/redis-adapter';
export { PostgresSessionAdapter, orderSagaSessions } from '@order-saga/postgres-adapter';
export type { PostgresSessionAdapterOptions } from '@order-saga/postgres-adapter';
