import type { SagaStep } from '../types.js';
import { SagaStepError } from '../types.js';
import type { StepOptions } from './options.js';
import { simulateLatency } from './options.js';

export const RESERVE_INVENTORY = 'reserve_inventory';

/**
 * Takes the ordered units out of the session's stock; compensation puts them
 * back.
 */
export function createReserveInventoryStep(options: StepOptions = {}): SagaStep {
  const { latencyMs, logger } = options;
  return {
    name: RESERVE_INVENTORY,
    metadata: { description: 'Reserve stock for the ordered product' },
    async execute(order, session) {
      if (!Object.hasOwn(session.inventory, order.productId)) {
        throw new SagaStepError(RESERVE_INVENTORY, 'Product not found');
      }
      const available = session.inventory[order.productId];
      if (available < order.quantity) {
        throw new SagaStepError(RESERVE_INVENTORY, 'Insufficient inventory');
      }
      session.inventory[order.productId] = available - order.quantity;
      await simulateLatency(latencyMs);
      logger?.info('inventory:reserved', {
        orderId: order.id,
        productId: order.productId,
        quantity: order.quantity,
      });
    },
    async compensate(order, session) {
      if (Object.hasOwn(session.inventory, order.productId)) {
        session.inventory[order.productId] += order.quantity;
      }
      logger?.info('inventory:released', {
        orderId: order.id,
        productId: order.productId,
        quantity: order.quantity,
      });
    },
  };
}
