import {
  NotFoundError,
  type AttemptStore,
  type ExecutionAttempt,
  type MetricsSnapshot,
  type MetricsSnapshotStore,
  type Order,
  type OrderStatus,
  type OrderStore,
} from '@sluice/types';

function copyOrder(order: Order): Order {
  return {
    ...order,
    intent: { ...order.intent },
    lastError: order.lastError ? { ...order.lastError } : undefined,
  };
}

/**
 * In-process order store.
 *
 * Updates for the same id are chained so that two concurrent `update` calls
 * never interleave their read and write. Every value crossing the boundary
 * is copied.
 */
export class MemoryOrderStore implements OrderStore {
  private orders: Map<string, Order> = new Map();
  private byClientId: Map<string, string> = new Map();
  private locks: Map<string, Promise<unknown>> = new Map();

  async insert(order: Order): Promise<void> {
    if (this.orders.has(order.id)) {
      throw new Error(`Duplicate order id: ${order.id}`);
    }
    const clientOrderId = order.intent.clientOrderId;
    if (clientOrderId !== undefined) {
      if (this.byClientId.has(clientOrderId)) {
        throw new Error(`Duplicate clientOrderId: ${clientOrderId}`);
      }
      this.byClientId.set(clientOrderId, order.id);
    }
    this.orders.set(order.id, copyOrder(order));
  }

  async get(id: string): Promise<Order | null> {
    const order = this.orders.get(id);
    return order ? copyOrder(order) : null;
  }

  async findByClientOrderId(clientOrderId: string): Promise<Order | null> {
    const id = this.byClientId.get(clientOrderId);
    return id === undefined ? null : this.get(id);
  }

  async update(id: string, mutate: (current: Order) => Order): Promise<Order> {
    const previous = this.locks.get(id) ?? Promise.resolve();
    const run = previous.then(() => this.applyUpdate(id, mutate));
    // The tail only orders later updates; callers see the rejection through `run`
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(id, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(id) === tail) {
        this.locks.delete(id);
      }
    }
  }

  async listByStatus(statuses: readonly OrderStatus[]): Promise<Order[]> {
    return [...this.orders.values()]
      .filter((o) => statuses.includes(o.status))
      .sort((a, b) => a.createdAt - b.createdAt)
      .map(copyOrder);
  }

  async listRecent(limit: number): Promise<Order[]> {
    return [...this.orders.values()]
      .sort((a, b) => b.createdAt - a.createdAt)
      .slice(0, Math.max(0, limit))
      .map(copyOrder);
  }

  async countByStatus(): Promise<Partial<Record<OrderStatus, number>>> {
    const counts: Partial<Record<OrderStatus, number>> = {};
    for (const order of this.orders.values()) {
      counts[order.status] = (counts[order.status] ?? 0) + 1;
    }
    return counts;
  }

  async deleteUpdatedBefore(statuses: readonly OrderStatus[], cutoff: number): Promise<number> {
    let removed = 0;
    for (const [id, order] of this.orders) {
      if (statuses.includes(order.status) && order.updatedAt < cutoff) {
        this.orders.delete(id);
        if (order.intent.clientOrderId !== undefined) {
          this.byClientId.delete(order.intent.clientOrderId);
        }
        removed++;
      }
    }
    return removed;
  }

  async close(): Promise<void> {
    this.orders.clear();
    this.byClientId.clear();
  }

  private applyUpdate(id: string, mutate: (current: Order) => Order): Order {
    const current = this.orders.get(id);
    if (!current) {
      throw new NotFoundError(id);
    }
    const next = mutate(copyOrder(current));
    this.orders.set(id, copyOrder(next));
    return copyOrder(next);
  }
}

export class MemoryAttemptStore implements AttemptStore {
  private attempts: ExecutionAttempt[] = [];

  async append(attempt: ExecutionAttempt): Promise<void> {
    this.attempts.push(Object.freeze({ ...attempt }));
  }

  async listByOrder(orderId: string): Promise<ExecutionAttempt[]> {
    return this.attempts.filter((a) => a.orderId === orderId);
  }

  async deleteBefore(cutoff: number): Promise<number> {
    const before = this.attempts.length;
    this.attempts = this.attempts.filter((a) => a.startedAt >= cutoff);
    return before - this.attempts.length;
  }
}

/** Keeps snapshots keyed by window start; a re-save of the same window replaces it */
export class MemoryMetricsSnapshotStore implements MetricsSnapshotStore {
  private snapshots: Map<number, MetricsSnapshot> = new Map();

  async save(snapshot: MetricsSnapshot): Promise<void> {
    this.snapshots.set(snapshot.windowStart, structuredClone(snapshot));
  }

  async latest(): Promise<MetricsSnapshot | null> {
    let latest: MetricsSnapshot | null = null;
    for (const snapshot of this.snapshots.values()) {
      if (!latest || snapshot.windowStart > latest.windowStart) {
        latest = snapshot;
      }
    }
    return latest ? structuredClone(latest) : null;
  }
}
