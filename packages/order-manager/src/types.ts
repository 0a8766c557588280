import type { OrderSnapshot, OrderStatus } from '@sluice/types';

/** Order manager configuration */
export interface OrderManagerConfig {
  /** Retries granted to an order when the caller does not say otherwise */
  defaultMaxRetries: number;
}

export const DEFAULT_ORDER_MANAGER_CONFIG: OrderManagerConfig = {
  defaultMaxRetries: 3,
};

export interface SubmitOptions {
  maxRetries?: number;
}

export interface SubmitResult {
  order: OrderSnapshot;
  /** False when an order with the same clientOrderId already existed */
  created: boolean;
}

/** Outcome of the startup recovery scan */
export interface RecoveryReport {
  /** EXECUTING orders put back to PENDING */
  requeued: string[];
  /** EXECUTING orders out of retries, now FAILED (interrupted) */
  failed: string[];
  /** SUBMITTED orders whose broadcast may have landed, now UNKNOWN */
  unknown: string[];
  /** EXECUTING or TIMED_OUT orders with a cancel requested, now CANCELLED */
  cancelled: string[];
  /** PENDING, QUEUED and TIMED_OUT orders the engine must enqueue again, oldest first */
  resumable: string[];
}

export interface OrderStatistics {
  total: number;
  byStatus: Record<OrderStatus, number>;
  /** Orders not yet in a terminal status */
  active: number;
  /** CONFIRMED over all orders that settled as CONFIRMED, FAILED or UNKNOWN */
  successRate: number;
}
