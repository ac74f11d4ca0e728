import {
  InMemoryAdapter,
  OrderSagaService,
  SagaOrchestrator,
  SessionStore,
  createConsoleLogger,
  createOrderPipeline,
  failShipmentForUser,
  loadConfig,
} from '@order-saga/core';
import type { AppConfig, Logger, SessionStateAdapter } from '@order-saga/core';
import { RedisSessionAdapter } from '@order-saga/redis-adapter';
import { PostgresSessionAdapter } from '@order-saga/postgres-adapter';
import { Redis } from 'ioredis';
import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';

/**
 * A backing store plus the function that releases its connections.
 */
export interface SessionBackend {
  adapter: SessionStateAdapter;
  close(): Promise<void>;
}

/**
 * Build the session storage named by `config.SESSION_BACKEND`.
 * Network clients are created without connecting; they connect on first use.
 */
export function createSessionBackend(config: AppConfig): SessionBackend {
  switch (config.SESSION_BACKEND) {
    case 'memory':
      return { adapter: new InMemoryAdapter(), close: async () => undefined };
    case 'redis': {
      const redis = new Redis(config.REDIS_URL, { lazyConnect: true });
      return {
        adapter: new RedisSessionAdapter(redis),
        close: async () => {
          redis.disconnect();
        },
      };
    }
    case 'postgres': {
      const pool = new pg.Pool({ connectionString: config.DATABASE_URL });
      return {
        adapter: new PostgresSessionAdapter(drizzle(pool)),
        close: () => pool.end(),
      };
    }
  }
}

export interface OrderSagaAppOptions {
  /** Environment to read configuration from. Defaults to `process.env`. */
  env?: Record<string, string | undefined>;
  /** Overrides the backend chosen by `SESSION_BACKEND`. */
  backend?: SessionBackend;
  /** Overrides the JSON console logger. */
  logger?: Logger;
}

export interface OrderSagaApp {
  config: AppConfig;
  logger: Logger;
  store: SessionStore;
  orchestrator: SagaOrchestrator;
  service: OrderSagaService;
  /** Release backend connections. */
  close(): Promise<void>;
}

/**
 * Wire configuration, logging, session storage, the order pipeline and the
 * application service together.
 *
 * @example
 * ```typescript
 * const app = createOrderSagaApp();
 * const session = await app.service.resolveSession(req.cookies.session_id);
 * const result = await app.service.submitOrder(session, req.body);
 * ```
 */
export function createOrderSagaApp(options: OrderSagaAppOptions = {}): OrderSagaApp {
  const config = loadConfig(options.env);
  const logger = options.logger ?? createConsoleLogger({ level: config.LOG_LEVEL });
  const backend = options.backend ?? createSessionBackend(config);

  const store = new SessionStore({
    adapter: backend.adapter,
    sessionTimeoutSeconds: config.SESSION_TIMEOUT_SECONDS,
    keyPrefix: config.SESSION_KEY_PREFIX,
    logger,
  });
  const orchestrator = new SagaOrchestrator(store, {
    logger,
    definition: createOrderPipeline({
      latencyMs: config.STEP_LATENCY_MS,
      faultRule: failShipmentForUser(config.SHIPPING_FAULT_USER_ID),
      logger,
    }),
  });
  const service = new OrderSagaService(store, orchestrator);

  logger.info('app:ready', {
    backend: config.SESSION_BACKEND,
    sessionTimeoutSeconds: config.SESSION_TIMEOUT_SECONDS,
  });

  return { config, logger, store, orchestrator, service, close: () => backend.close() };
}
