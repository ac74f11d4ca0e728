/** Order- and saga-level lifecycle. `processing` marks a saga that is running. */
export const ORDER_STATUSES = [
  'pending',
  'processing',
  'completed',
  'failed',
  'compensating',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

/** Per-step lifecycle. */
export const STEP_STATUSES = ['pending', 'completed', 'failed', 'compensated'] as const;

export type StepStatus = (typeof STEP_STATUSES)[number];

/**
 * An order submitted by a user.  Only the orchestrator changes `status`; every
 * other field is fixed at creation.
 */
export interface Order {
  id: string;
  userId: string;
  productId: string;
  /** Positive whole number of units. */
  quantity: number;
  /** Positive order total. */
  amount: number;
  status: OrderStatus;
}

/**
 * Outcome record of one pipeline stage within a saga.
 */
export interface SagaStepRecord {
  /** Pipeline stage identifier, e.g. `reserve_inventory`. */
  name: string;
  status: StepStatus;
  /** Set when the stage failed. */
  errorMessage?: string;
}

/**
 * One run of the order pipeline.  `steps` always mirrors the pipeline
 * definition, in the same order.
 */
export interface SagaTransaction {
  id: string;
  /** Reference to the order this saga processed. */
  orderId: string;
  steps: SagaStepRecord[];
  status: OrderStatus;
}

/**
 * A user's isolated working set of mock resources.
 *
 * The four maps are plain records keyed by id so they serialize directly and
 * keep insertion order.
 */
export interface UserSession {
  sessionId: string;
  /** Epoch milliseconds. */
  createdAt: number;
  orders: Record<string, Order>;
  /** product id → available units */
  inventory: Record<string, number>;
  /** user id → balance */
  balances: Record<string, number>;
  sagaTransactions: Record<string, SagaTransaction>;
}

/**
 * Metadata associated with a single saga step.
 */
export interface SagaStepMetadata {
  /** Human-readable description of what this step does. */
  description?: string;
}

/**
 * A single stage of the order pipeline: a forward action plus the action that
 * semantically undoes it.
 */
export interface SagaStep {
  /** Unique name that identifies this step within the saga. */
  name: string;
  /**
   * Perform the stage against the session's resources.
   * Throwing (normally a {@link SagaStepError}) marks the stage as failed.
   */
  execute(order: Order, session: UserSession): Promise<void>;
  /**
   * Undo the effects of a previously completed `execute()`.
   * Called during rollback when a later stage fails.
   */
  compensate(order: Order, session: UserSession): Promise<void>;
  /** Optional metadata surfaced in the execution plan. */
  metadata?: SagaStepMetadata;
}

/**
 * Minimal structured logger accepted throughout the library.  Messages are
 * short event names (`saga:start`, `step:error`, …) with details in `meta`.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown by a step's `execute()` to report an expected business failure
 * (bad input, insufficient stock or funds, a shipping fault).
 */
export class SagaStepError extends Error {
  /** The name of the step that failed. */
  readonly stepName: string;

  constructor(stepName: string, message: string) {
    super(message);
    this.name = 'SagaStepError';
    this.stepName = stepName;
  }
}

/**
 * Describes a compensation that failed during rollback.  It is logged, not
 * thrown: the step keeps its `completed` status and rollback continues.
 */
export class SagaCompensationError extends Error {
  /** The name of the step whose compensation failed. */
  readonly stepName: string;
  /** The original error thrown by the `compensate()` function. */
  readonly cause: unknown;

  constructor(stepName: string, cause: unknown) {
    super(
      `SagaCompensationError: compensation for step "${stepName}" failed. Manual intervention may be required.`,
    );
    this.name = 'SagaCompensationError';
    this.stepName = stepName;
    this.cause = cause;
  }
}

/**
 * Thrown when an operation requires an existing session and the identifier is
 * unknown or expired.
 */
export class SessionNotFoundError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session "${sessionId}" not found or expired`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

export class OrderNotFoundError extends Error {
  readonly orderId: string;

  constructor(orderId: string) {
    super('Order not found');
    this.name = 'OrderNotFoundError';
    this.orderId = orderId;
  }
}

export class SagaNotFoundError extends Error {
  readonly sagaId: string;

  constructor(sagaId: string) {
    super('Saga not found');
    this.name = 'SagaNotFoundError';
    this.sagaId = sagaId;
  }
}

// ---------------------------------------------------------------------------
// Lifecycle hook types
// ---------------------------------------------------------------------------

/** Called immediately before a step's `execute()` is invoked. */
export type BeforeStepHook = (
  stepName: string,
  order: Order,
  session: UserSession,
) => void | Promise<void>;

/** Called immediately after a step's `execute()` resolves successfully. */
export type AfterStepHook = (
  stepName: string,
  order: Order,
  session: UserSession,
) => void | Promise<void>;

/** Called when a step's `execute()` throws. */
export type ErrorHook = (
  stepName: string,
  error: unknown,
  order: Order,
  session: UserSession,
) => void | Promise<void>;

/** Called after a step's `compensate()` succeeds during rollback. */
export type CompensationHook = (
  stepName: string,
  order: Order,
  session: UserSession,
) => void | Promise<void>;

/**
 * Describes a single step as it appears in an execution plan.
 */
export interface ExecutionPlanStep {
  /** The step's unique name. */
  name: string;
  /** Human-readable description taken from step metadata, if available. */
  description?: string;
}

/**
 * Returned by {@link SagaOrchestrator.plan}: the ordered stages a saga would
 * run, without running any of them.
 */
export interface DryRunResult {
  readonly dryRun: true;
  readonly plan: readonly ExecutionPlanStep[];
}
