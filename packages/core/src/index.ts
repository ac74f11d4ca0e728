export type {
  Order,
  OrderStatus,
  StepStatus,
  SagaStepRecord,
  SagaTransaction,
  UserSession,
  SagaStep,
  SagaStepMetadata,
  Logger,
  BeforeStepHook,
  AfterStepHook,
  ErrorHook,
  CompensationHook,
  ExecutionPlanStep,
  DryRunResult,
} from './types.js';
export {
  ORDER_STATUSES,
  STEP_STATUSES,
  SagaStepError,
  SagaCompensationError,
  SessionNotFoundError,
  OrderNotFoundError,
  SagaNotFoundError,
} from './types.js';
export { SagaBuilder } from './builder.js';
export type { SagaDefinition } from './builder.js';
export { SagaOrchestrator } from './executor.js';
export type { SagaOrchestratorOptions } from './executor.js';
export { ORDER_SAGA_STEPS, createOrderPipeline } from './pipeline.js';
export type { OrderSagaStepName, OrderPipelineOptions } from './pipeline.js';
export { KeyedLock } from './lock.js';
export type { SessionStateAdapter, InMemoryAdapterOptions } from './persistence.js';
export { InMemoryAdapter } from './persistence.js';
export {
  SessionStore,
  DEFAULT_SESSION_TIMEOUT_SECONDS,
  DEFAULT_SESSION_KEY_PREFIX,
} from './session-store.js';
export type { SessionStoreOptions } from './session-store.js';
export {
  createDefaultInventory,
  createDefaultBalances,
  createDefaultOrders,
  createDefaultSagaTransactions,
} from './seed.js';
export {
  SerializationError,
  SESSION_FORMAT_VERSION,
  encodeSession,
  decodeSession,
  toSessionRecord,
  fromSessionRecord,
} from './serialization.js';
export type { SessionRecord } from './serialization.js';
export {
  CreateOrderRequestSchema,
  InvalidOrderRequestError,
  parseCreateOrderRequest,
  createOrder,
} from './orders.js';
export type { CreateOrderRequest } from './orders.js';
export { OrderSagaService } from './service.js';
export type { SubmitOrderResult } from './service.js';
export { createConsoleLogger, LOG_LEVELS } from './logger.js';
export type { LogLevel, ConsoleLoggerOptions } from './logger.js';
export { loadConfig, ConfigError } from './config.js';
export type { AppConfig } from './config.js';

// ---------------------------------------------------------------------------
// Pipeline stages
// ---------------------------------------------------------------------------
export {
  VALIDATE_ORDER,
  RESERVE_INVENTORY,
  PROCESS_PAYMENT,
  SHIP_ORDER,
  DEFAULT_SHIPPING_FAULT_USER_ID,
  createValidateOrderStep,
  createReserveInventoryStep,
  createProcessPaymentStep,
  createShipOrderStep,
  failShipmentForUser,
  noShippingFaults,
} from './steps/index.js';
export type { StepOptions, ShippingFaultRule, ShipOrderStepOptions } from './steps/index.js';
