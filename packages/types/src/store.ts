import type { ExecutionAttempt } from './execution.js';
import type { MetricsSnapshot } from './metrics.js';
import type { Order, OrderStatus } from './order.js';

// ============================================================================
// Persistence Ports
// ============================================================================

/**
 * Durable order arena keyed by order id.
 *
 * `update` is the only mutation path for existing rows: it reads the current
 * row, applies `mutate` and writes the result inside one single-row
 * transaction. If `mutate` throws, nothing is written and the error
 * propagates.
 */
export interface OrderStore {
  insert(order: Order): Promise<void>;
  get(id: string): Promise<Order | null>;
  findByClientOrderId(clientOrderId: string): Promise<Order | null>;
  update(id: string, mutate: (current: Order) => Order): Promise<Order>;
  listByStatus(statuses: readonly OrderStatus[]): Promise<Order[]>;
  listRecent(limit: number): Promise<Order[]>;
  countByStatus(): Promise<Partial<Record<OrderStatus, number>>>;
  /** Delete orders in `statuses` last updated before `cutoff` (epoch ms) */
  deleteUpdatedBefore(statuses: readonly OrderStatus[], cutoff: number): Promise<number>;
  close(): Promise<void>;
}

/** Append-only log of execution attempts */
export interface AttemptStore {
  append(attempt: ExecutionAttempt): Promise<void>;
  listByOrder(orderId: string): Promise<ExecutionAttempt[]>;
  deleteBefore(cutoff: number): Promise<number>;
}

/** Periodic metrics snapshots keyed by window start */
export interface MetricsSnapshotStore {
  save(snapshot: MetricsSnapshot): Promise<void>;
  latest(): Promise<MetricsSnapshot | null>;
}
