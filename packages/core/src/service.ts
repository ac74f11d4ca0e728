import type {
  Order,
  OrderStatus,
  SagaStepRecord,
  SagaTransaction,
  UserSession,
} from './types.js';
import { OrderNotFoundError, SagaNotFoundError, SessionNotFoundError } from './types.js';
import type { SessionStore } from './session-store.js';
import type { SagaOrchestrator } from './executor.js';
import { createOrder, parseCreateOrderRequest } from './orders.js';

/**
 * Summary returned for every submitted order, whatever its business outcome.
 */
export interface SubmitOrderResult {
  orderId: string;
  sagaId: string;
  status: OrderStatus;
  steps: SagaStepRecord[];
}

/**
 * Transport-free operations a front end calls: submit an order, look up
 * orders and sagas, read inventory and balances, reset a session.
 *
 * @example
 * ```typescript
 * const session = await service.resolveSession(cookieSessionId);
 * const result = await service.submitOrder(session, body);
 * ```
 */
export class OrderSagaService {
  private readonly _store: SessionStore;
  private readonly _orchestrator: SagaOrchestrator;

  constructor(store: SessionStore, orchestrator: SagaOrchestrator) {
    this._store = store;
    this._orchestrator = orchestrator;
  }

  /** The caller's live session, or a new one. */
  async resolveSession(sessionId?: string | null): Promise<UserSession> {
    return this._store.getOrCreate(sessionId);
  }

  /**
   * Validate `input`, create the order in `session` and run its saga.
   *
   * @throws {@link InvalidOrderRequestError} if `input` is malformed; a saga
   *   that fails is a normal result.
   */
  async submitOrder(session: UserSession, input: unknown): Promise<SubmitOrderResult> {
    const order = createOrder(parseCreateOrderRequest(input));
    session.orders[order.id] = order;
    const saga = await this._orchestrator.executeSaga(order, session);
    return {
      orderId: order.id,
      sagaId: saga.id,
      status: saga.status,
      steps: saga.steps.map((step) => ({ ...step })),
    };
  }

  /** @throws {@link OrderNotFoundError} */
  getOrder(session: UserSession, orderId: string): Order {
    if (!Object.hasOwn(session.orders, orderId)) {
      throw new OrderNotFoundError(orderId);
    }
    return session.orders[orderId];
  }

  /** Orders in the session, most recent first. */
  listOrders(session: UserSession): Order[] {
    return Object.values(session.orders).reverse();
  }

  /** @throws {@link SagaNotFoundError} */
  getSaga(session: UserSession, sagaId: string): SagaTransaction {
    if (!Object.hasOwn(session.sagaTransactions, sagaId)) {
      throw new SagaNotFoundError(sagaId);
    }
    return session.sagaTransactions[sagaId];
  }

  getInventory(session: UserSession): Record<string, number> {
    return { ...session.inventory };
  }

  getBalances(session: UserSession): Record<string, number> {
    return { ...session.balances };
  }

  /**
   * Restore the session's seed data.
   * @throws {@link SessionNotFoundError} if the session is unknown or expired.
   */
  async resetSession(sessionId: string): Promise<UserSession> {
    const session = await this._store.reset(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }
}
