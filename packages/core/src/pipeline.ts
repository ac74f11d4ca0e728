import { SagaBuilder } from './builder.js';
import type { SagaDefinition } from './builder.js';
import {
  PROCESS_PAYMENT,
  RESERVE_INVENTORY,
  SHIP_ORDER,
  VALIDATE_ORDER,
  createProcessPaymentStep,
  createReserveInventoryStep,
  createShipOrderStep,
  createValidateOrderStep,
} from './steps/index.js';
import type { ShipOrderStepOptions } from './steps/index.js';

/** Stage names of the order pipeline, in execution order. */
export const ORDER_SAGA_STEPS = [
  VALIDATE_ORDER,
  RESERVE_INVENTORY,
  PROCESS_PAYMENT,
  SHIP_ORDER,
] as const;

export type OrderSagaStepName = (typeof ORDER_SAGA_STEPS)[number];

/**
 * Options for {@link createOrderPipeline}.  `latencyMs` and `logger` apply to
 * every stage; `faultRule` to shipping only.
 */
export type OrderPipelineOptions = ShipOrderStepOptions;

/**
 * Build the fixed order pipeline: validate, reserve inventory, charge
 * payment, ship.
 */
export function createOrderPipeline(options: OrderPipelineOptions = {}): SagaDefinition {
  const { faultRule, ...stepOptions } = options;
  return new SagaBuilder()
    .addStep(createValidateOrderStep(stepOptions))
    .addStep(createReserveInventoryStep(stepOptions))
    .addStep(createProcessPaymentStep(stepOptions))
    .addStep(createShipOrderStep({ ...stepOptions, faultRule }))
    .build();
}
