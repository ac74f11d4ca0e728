import type { SagaStep } from '../types.js';
import { SagaStepError } from '../types.js';
import type { StepOptions } from './options.js';
import { simulateLatency } from './options.js';

export const VALIDATE_ORDER = 'validate_order';

/**
 * Checks that quantity is a positive whole number, that amount is a positive
 * finite number and that the user has a balance in this session.  Mutates
 * nothing, so there is nothing to compensate.
 */
export function createValidateOrderStep(options: StepOptions = {}): SagaStep {
  const { latencyMs, logger } = options;
  return {
    name: VALIDATE_ORDER,
    metadata: { description: 'Validate quantity, amount and user' },
    async execute(order, session) {
      if (!Number.isInteger(order.quantity) || order.quantity <= 0) {
        throw new SagaStepError(VALIDATE_ORDER, 'Invalid quantity');
      }
      if (!Number.isFinite(order.amount) || order.amount <= 0) {
        throw new SagaStepError(VALIDATE_ORDER, 'Invalid amount');
      }
      if (!Object.hasOwn(session.balances, order.userId)) {
        throw new SagaStepError(VALIDATE_ORDER, 'User not found');
      }
      await simulateLatency(latencyMs);
      logger?.info('order:validated', { orderId: order.id });
    },
    async compensate(order) {
      logger?.info('order:validation-compensated', { orderId: order.id });
    },
  };
}
