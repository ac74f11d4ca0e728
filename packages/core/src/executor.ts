import { randomUUID } from 'node:crypto';
import type {
  AfterStepHook,
  BeforeStepHook,
  CompensationHook,
  DryRunResult,
  ErrorHook,
  Logger,
  Order,
  OrderStatus,
  SagaStepRecord,
  SagaTransaction,
  UserSession,
} from './types.js';
import { SagaCompensationError } from './types.js';
import type { SagaDefinition } from './builder.js';
import type { SessionStore } from './session-store.js';
import { KeyedLock } from './lock.js';
import { createOrderPipeline } from './pipeline.js';

/**
 * Options for {@link SagaOrchestrator}.
 */
export interface SagaOrchestratorOptions {
  /** Pipeline to run. Defaults to {@link createOrderPipeline}. */
  definition?: SagaDefinition;
  logger?: Logger;
  /**
   * Lock used to serialize sagas on the same session.  Pass a shared
   * instance when several orchestrators work against one store.
   */
  locks?: KeyedLock;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs the order pipeline against one session at a time.
 *
 * Stages run strictly in order.  When a stage fails, every stage that
 * completed before it is compensated in reverse order and the saga ends
 * `failed`; step failures are recorded on the returned
 * {@link SagaTransaction}, never thrown.
 *
 * Compensation is best-effort and does not retry: a compensation that throws
 * is logged and its step stays `completed`, and the remaining steps are still
 * compensated.
 *
 * @example
 * ```typescript
 * const orchestrator = new SagaOrchestrator(store, { logger });
 * const saga = await orchestrator.executeSaga(order, session);
 * if (saga.status === 'failed') { ... }
 * ```
 */
export class SagaOrchestrator {
  private readonly _store: SessionStore;
  private readonly _definition: SagaDefinition;
  private readonly _logger: Logger | undefined;
  private readonly _locks: KeyedLock;

  private readonly _beforeStepHooks: BeforeStepHook[] = [];
  private readonly _afterStepHooks: AfterStepHook[] = [];
  private readonly _errorHooks: ErrorHook[] = [];
  private readonly _compensationHooks: CompensationHook[] = [];

  constructor(store: SessionStore, options: SagaOrchestratorOptions = {}) {
    this._store = store;
    this._logger = options.logger;
    this._definition = options.definition ?? createOrderPipeline({ logger: options.logger });
    this._locks = options.locks ?? new KeyedLock();
  }

  get definition(): SagaDefinition {
    return this._definition;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle hook registration
  // ---------------------------------------------------------------------------

  /**
   * Register a hook to be called immediately **before** each step's
   * `execute()`.  A hook that throws fails that step.
   * Returns `this` for fluent chaining.
   */
  onBeforeStep(hook: BeforeStepHook): this {
    this._beforeStepHooks.push(hook);
    return this;
  }

  /**
   * Register a hook to be called immediately **after** each step's
   * `execute()` resolves successfully.
   * Returns `this` for fluent chaining.
   */
  onAfterStep(hook: AfterStepHook): this {
    this._afterStepHooks.push(hook);
    return this;
  }

  /**
   * Register a hook to be called when a step's `execute()` throws.
   * Returns `this` for fluent chaining.
   */
  onError(hook: ErrorHook): this {
    this._errorHooks.push(hook);
    return this;
  }

  /**
   * Register a hook to be called each time a step is successfully
   * compensated during rollback.
   * Returns `this` for fluent chaining.
   */
  onCompensation(hook: CompensationHook): this {
    this._compensationHooks.push(hook);
    return this;
  }

  // ---------------------------------------------------------------------------
  // Public execution API
  // ---------------------------------------------------------------------------

  /** The stages a saga would run, in order. Invokes nothing. */
  plan(): DryRunResult {
    return {
      dryRun: true,
      plan: Object.freeze(
        this._definition.steps.map((step) => ({
          name: step.name,
          description: step.metadata?.description,
        })),
      ),
    };
  }

  /**
   * Run the pipeline for `order` against `session` and persist the outcome.
   *
   * Calls for the same session are serialized; calls for different sessions
   * run concurrently.  Once the lock is held, `session` is refreshed in place
   * from the store, so a caller holding an older copy does not overwrite
   * sagas that settled since it was loaded.  The saga is then registered in
   * `session.sagaTransactions` (and the order in `session.orders`) and
   * persisted before the first stage runs.
   *
   * @returns The saga, `completed` or `failed`.
   */
  async executeSaga(order: Order, session: UserSession): Promise<SagaTransaction> {
    return this._locks.run(session.sessionId, () => this._execute(order, session));
  }

  /**
   * Compensate, newest first, every step before `failedIndex` whose status
   * is `completed`, then write the saga back into the session and persist
   * it.
   */
  async compensateSaga(
    saga: SagaTransaction,
    failedIndex: number,
    order: Order,
    session: UserSession,
  ): Promise<void> {
    this._logger?.info('saga:compensate', { sagaId: saga.id, failedIndex });
    saga.status = 'compensating';

    for (let i = failedIndex - 1; i >= 0; i--) {
      const record = saga.steps[i];
      if (record.status !== 'completed') {
        continue;
      }
      const step = this._definition.steps[i];
      let compensated = false;
      try {
        await step.compensate(order, session);
        record.status = 'compensated';
        compensated = true;
      } catch (err) {
        const failure = new SagaCompensationError(step.name, err);
        this._logger?.error('compensation:error', {
          sagaId: saga.id,
          stepName: step.name,
          error: failure.message,
          cause: errorMessage(err),
        });
      }
      if (compensated) {
        this._logger?.info('step:compensate', { sagaId: saga.id, stepName: step.name });
        for (const hook of this._compensationHooks) {
          await hook(step.name, order, session);
        }
      }
    }

    session.sagaTransactions[saga.id] = saga;
    await this._store.save(session);
    this._logger?.info('saga:compensated', { sagaId: saga.id });
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _execute(order: Order, session: UserSession): Promise<SagaTransaction> {
    const steps = this._definition.steps;
    const saga: SagaTransaction = {
      id: randomUUID(),
      orderId: order.id,
      steps: steps.map((step): SagaStepRecord => ({ name: step.name, status: 'pending' })),
      status: 'processing',
    };
    order.status = 'processing';

    try {
      await this._refresh(session);
      session.orders[order.id] = order;
      session.sagaTransactions[saga.id] = saga;
      this._logger?.info('saga:start', { sagaId: saga.id, orderId: order.id });
      await this._store.save(session);

      for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        const record = saga.steps[i];
        try {
          for (const hook of this._beforeStepHooks) {
            await hook(step.name, order, session);
          }
          this._logger?.debug('step:start', { sagaId: saga.id, stepName: step.name });
          await step.execute(order, session);
        } catch (err) {
          record.status = 'failed';
          record.errorMessage = errorMessage(err);
          this._logger?.error('step:error', {
            sagaId: saga.id,
            stepName: step.name,
            error: record.errorMessage,
          });
          for (const hook of this._errorHooks) {
            await hook(step.name, err, order, session);
          }
          await this.compensateSaga(saga, i, order, session);
          return await this._settle(saga, order, session, 'failed');
        }

        record.status = 'completed';
        this._logger?.info('step:complete', { sagaId: saga.id, stepName: step.name });
        for (const hook of this._afterStepHooks) {
          await hook(step.name, order, session);
        }
      }

      return await this._settle(saga, order, session, 'completed');
    } catch (err) {
      // Only reached for failures outside a stage's own action.
      saga.status = 'failed';
      order.status = 'failed';
      session.orders[order.id] = order;
      session.sagaTransactions[saga.id] = saga;
      this._logger?.error('saga:error', {
        sagaId: saga.id,
        orderId: order.id,
        error: errorMessage(err),
      });
      await this._persistAfterError(saga, session);
      return saga;
    }
  }

  /** Overwrite the caller's copy with the latest stored state, when there is one. */
  private async _refresh(session: UserSession): Promise<void> {
    const latest = await this._store.get(session.sessionId);
    if (!latest) {
      return;
    }
    session.createdAt = latest.createdAt;
    session.orders = latest.orders;
    session.inventory = latest.inventory;
    session.balances = latest.balances;
    session.sagaTransactions = latest.sagaTransactions;
  }

  /** Record the terminal status on saga and order, then persist. */
  private async _settle(
    saga: SagaTransaction,
    order: Order,
    session: UserSession,
    status: Extract<OrderStatus, 'completed' | 'failed'>,
  ): Promise<SagaTransaction> {
    saga.status = status;
    order.status = status;
    session.orders[order.id] = order;
    session.sagaTransactions[saga.id] = saga;
    await this._store.save(session);
    this._logger?.info(status === 'completed' ? 'saga:complete' : 'saga:failed', {
      sagaId: saga.id,
      orderId: order.id,
    });
    return saga;
  }

  private async _persistAfterError(saga: SagaTransaction, session: UserSession): Promise<void> {
    try {
      await this._store.save(session);
    } catch (err) {
      this._logger?.error('saga:persist-error', { sagaId: saga.id, error: errorMessage(err) });
    }
  }
}
