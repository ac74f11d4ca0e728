import type { Order, SagaStep } from '../types.js';
import { SagaStepError } from '../types.js';
import type { StepOptions } from './options.js';
import { simulateLatency } from './options.js';

export const SHIP_ORDER = 'ship_order';

/**
 * Decides whether a shipment should fail.  Returns the failure reason, or
 * `undefined` to let the shipment go through.
 */
export type ShippingFaultRule = (order: Order) => string | undefined;

/** User whose shipments fail under the default rule. */
export const DEFAULT_SHIPPING_FAULT_USER_ID = 'user_3';

/**
 * Build a rule that fails every shipment for `userId`.
 *
 * @example
 * ```typescript
 * createShipOrderStep({ faultRule: failShipmentForUser('user_2') });
 * ```
 */
export function failShipmentForUser(
  userId: string,
  reason = 'Shipping address invalid',
): ShippingFaultRule {
  return (order) => (order.userId === userId ? reason : undefined);
}

/** A rule that never fails. */
export const noShippingFaults: ShippingFaultRule = () => undefined;

export interface ShipOrderStepOptions extends StepOptions {
  /**
   * Deterministic failure condition used to exercise rollback.
   * @default failShipmentForUser('user_3')
   */
  faultRule?: ShippingFaultRule;
}

/**
 * Simulated shipment.  Nothing reversible is mutated, so compensation only
 * records the cancellation.
 */
export function createShipOrderStep(options: ShipOrderStepOptions = {}): SagaStep {
  const { latencyMs, logger } = options;
  const faultRule = options.faultRule ?? failShipmentForUser(DEFAULT_SHIPPING_FAULT_USER_ID);
  return {
    name: SHIP_ORDER,
    metadata: { description: 'Ship the order' },
    async execute(order) {
      const fault = faultRule(order);
      if (fault !== undefined) {
        throw new SagaStepError(SHIP_ORDER, fault);
      }
      await simulateLatency(latencyMs);
      logger?.info('order:shipped', { orderId: order.id });
    },
    async compensate(order) {
      logger?.info('shipment:cancelled', { orderId: order.id });
    },
  };
}
