import type { SagaStep } from '../types.js';
import { SagaStepError } from '../types.js';
import type { StepOptions } from './options.js';
import { simulateLatency } from './options.js';

export const PROCESS_PAYMENT = 'process_payment';

/**
 * Charges the order amount against the user's balance; compensation refunds
 * it.
 */
export function createProcessPaymentStep(options: StepOptions = {}): SagaStep {
  const { latencyMs, logger } = options;
  return {
    name: PROCESS_PAYMENT,
    metadata: { description: "Charge the order amount to the user's balance" },
    async execute(order, session) {
      if (!Object.hasOwn(session.balances, order.userId)) {
        throw new SagaStepError(PROCESS_PAYMENT, 'User not found');
      }
      const balance = session.balances[order.userId];
      if (balance < order.amount) {
        throw new SagaStepError(PROCESS_PAYMENT, 'Insufficient funds');
      }
      session.balances[order.userId] = balance - order.amount;
      await simulateLatency(latencyMs);
      logger?.info('payment:charged', {
        orderId: order.id,
        userId: order.userId,
        amount: order.amount,
      });
    },
    async compensate(order, session) {
      if (!Object.hasOwn(session.balances, order.userId)) {
        throw new Error(`User not found: cannot refund ${order.userId}`);
      }
      session.balances[order.userId] += order.amount;
      logger?.info('payment:refunded', {
        orderId: order.id,
        userId: order.userId,
        amount: order.amount,
      });
    },
  };
}
