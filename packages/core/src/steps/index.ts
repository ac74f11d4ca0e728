export type { StepOptions } from './options.js';
export { VALIDATE_ORDER, createValidateOrderStep } from './ValidateOrderStep.js';
export { RESERVE_INVENTORY, createReserveInventoryStep } from './ReserveInventoryStep.js';
export { PROCESS_PAYMENT, createProcessPaymentStep } from './ProcessPaymentStep.js';
export {
  SHIP_ORDER,
  DEFAULT_SHIPPING_FAULT_USER_ID,
  createShipOrderStep,
  failShipmentForUser,
  noShippingFaults,
} from './ShipOrderStep.js';
export type { ShippingFaultRule, ShipOrderStepOptions } from './ShipOrderStep.js';
