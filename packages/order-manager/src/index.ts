/**
 * @sluice/order-manager - Order lifecycle management
 */

export { OrderManager, IN_FLIGHT_CANCEL_NOTE } from './order-manager.js';
export { validateIntent, validateMaxRetries } from './validation.js';
export { DEFAULT_ORDER_MANAGER_CONFIG } from './types.js';
export type {
  OrderManagerConfig,
  SubmitOptions,
  SubmitResult,
  RecoveryReport,
  OrderStatistics,
} from './types.js';
