import { randomUUID } from 'node:crypto';
import {
  canTransition,
  IllegalTransitionError,
  IN_FLIGHT_STATUSES,
  isTerminalStatus,
  NotFoundError,
  ORDER_STATUSES,
  TERMINAL_STATUSES,
  type CancelResult,
  type Order,
  type OrderSnapshot,
  type OrderStatus,
  type OrderStore,
  type TradingIntent,
  type TransitionMetadata,
} from '@sluice/types';
import {
  DEFAULT_ORDER_MANAGER_CONFIG,
  type OrderManagerConfig,
  type OrderStatistics,
  type RecoveryReport,
  type SubmitOptions,
  type SubmitResult,
} from './types.js';
import { validateIntent, validateMaxRetries } from './validation.js';

export const IN_FLIGHT_CANCEL_NOTE =
  'cancellation requested; no further retries will occur, but an in-flight submission may still land';

/** Statuses the engine picks back up after a restart */
const RESUMABLE_STATUSES: readonly OrderStatus[] = ['PENDING', 'QUEUED', 'TIMED_OUT'];

function toSnapshot(order: Order): OrderSnapshot {
  return Object.freeze({
    ...order,
    intent: Object.freeze({ ...order.intent }),
    lastError: order.lastError ? Object.freeze({ ...order.lastError }) : undefined,
  });
}

/**
 * Order Manager
 *
 * Owns the order lifecycle. Every status change goes through `transition`,
 * which checks the legal-transition table and writes through the store's
 * single-row `update`. Callers only ever see frozen snapshots.
 */
export class OrderManager {
  private config: OrderManagerConfig;

  constructor(
    private store: OrderStore,
    config: Partial<OrderManagerConfig> = {},
    private now: () => number = Date.now,
    private generateId: () => string = randomUUID,
  ) {
    this.config = { ...DEFAULT_ORDER_MANAGER_CONFIG, ...config };
    validateMaxRetries(this.config.defaultMaxRetries);
  }

  /**
   * Validate an intent and persist a PENDING order for it.
   * An intent carrying a known clientOrderId returns the existing order's id.
   */
  async submit(intent: TradingIntent, opts: SubmitOptions = {}): Promise<string> {
    const { order } = await this.submitOrder(intent, opts);
    return order.id;
  }

  /** Like submit, but says whether a new order was created */
  async submitOrder(intent: TradingIntent, opts: SubmitOptions = {}): Promise<SubmitResult> {
    const valid = validateIntent(intent);
    const maxRetries = validateMaxRetries(opts.maxRetries ?? this.config.defaultMaxRetries);

    if (valid.clientOrderId !== undefined) {
      const existing = await this.store.findByClientOrderId(valid.clientOrderId);
      if (existing) return { order: toSnapshot(existing), created: false };
    }

    const timestamp = this.now();
    const order: Order = {
      id: this.generateId(),
      intent: valid,
      status: 'PENDING',
      createdAt: timestamp,
      updatedAt: timestamp,
      attemptCount: 0,
      maxRetries,
      cancelRequested: false,
    };

    try {
      await this.store.insert(order);
    } catch (err) {
      // Lost a race against a concurrent submit with the same key
      if (valid.clientOrderId !== undefined) {
        const existing = await this.store.findByClientOrderId(valid.clientOrderId);
        if (existing) return { order: toSnapshot(existing), created: false };
      }
      throw err;
    }

    return { order: toSnapshot(order), created: true };
  }

  async getStatus(orderId: string): Promise<OrderSnapshot> {
    const order = await this.store.get(orderId);
    if (!order) {
      throw new NotFoundError(orderId);
    }
    return toSnapshot(order);
  }

  /**
   * Move an order to `next`, applying metadata in the same write.
   * Throws IllegalTransitionError if the table forbids it.
   */
  async transition(
    orderId: string,
    next: OrderStatus,
    metadata: TransitionMetadata = {},
  ): Promise<OrderSnapshot> {
    const updated = await this.store.update(orderId, (current) => {
      if (!canTransition(current.status, next)) {
        throw new IllegalTransitionError(orderId, current.status, next);
      }
      return {
        ...current,
        status: next,
        updatedAt: this.now(),
        attemptCount: current.attemptCount + (metadata.countAttempt ? 1 : 0),
        lastError: next === 'CONFIRMED' ? undefined : (metadata.error ?? current.lastError),
        executionMethod: metadata.executionMethod ?? current.executionMethod,
        resultReference: metadata.resultReference ?? current.resultReference,
      };
    });
    return toSnapshot(updated);
  }

  /**
   * Cancel an order.
   *
   * Before execution the cancellation is authoritative. Once a worker owns
   * the order it only suppresses further retries: a broadcast already made
   * may still land.
   */
  async cancel(orderId: string): Promise<CancelResult> {
    let result: CancelResult = { accepted: false, note: '' };

    await this.store.update(orderId, (current) => {
      if (isTerminalStatus(current.status)) {
        result = { accepted: false, note: `order already ${current.status}` };
        return current;
      }
      if (IN_FLIGHT_STATUSES.includes(current.status)) {
        result = { accepted: false, note: IN_FLIGHT_CANCEL_NOTE };
        return { ...current, cancelRequested: true, updatedAt: this.now() };
      }
      result = { accepted: true, note: 'order cancelled' };
      return { ...current, status: 'CANCELLED', cancelRequested: true, updatedAt: this.now() };
    });

    return result;
  }

  /** Delete terminal orders last updated more than `retentionMs` ago */
  async cleanup(retentionMs: number): Promise<number> {
    return this.store.deleteUpdatedBefore(TERMINAL_STATUSES, this.now() - retentionMs);
  }

  /**
   * Startup scan. Must finish before any worker starts.
   *
   * EXECUTING: the attempt was cut short, so it counts. CANCELLED if a
   * cancel was requested, back to PENDING if retries remain, otherwise
   * FAILED (interrupted).
   * SUBMITTED: the broadcast may have landed; resubmitting could double
   * spend, so the order becomes UNKNOWN.
   * TIMED_OUT with a cancel requested: CANCELLED instead of resumed.
   */
  async recover(): Promise<RecoveryReport> {
    const report: RecoveryReport = { requeued: [], failed: [], unknown: [], cancelled: [], resumable: [] };

    for (const order of await this.store.listByStatus(IN_FLIGHT_STATUSES)) {
      if (order.status === 'SUBMITTED') {
        await this.transition(order.id, 'UNKNOWN', {
          countAttempt: true,
          error: {
            kind: 'UnknownOutcomeError',
            message: 'Process restarted after broadcast; outcome unknown',
          },
        });
        report.unknown.push(order.id);
        continue;
      }

      if (order.cancelRequested) {
        await this.transition(order.id, 'CANCELLED', { countAttempt: true });
        report.cancelled.push(order.id);
      } else if (order.attemptCount + 1 <= order.maxRetries) {
        await this.transition(order.id, 'PENDING', { countAttempt: true });
        report.requeued.push(order.id);
      } else {
        await this.transition(order.id, 'FAILED', {
          countAttempt: true,
          error: { kind: 'interrupted', message: 'Execution interrupted by restart; retries exhausted' },
        });
        report.failed.push(order.id);
      }
    }

    for (const order of await this.store.listByStatus(RESUMABLE_STATUSES)) {
      if (order.cancelRequested) {
        await this.transition(order.id, 'CANCELLED');
        report.cancelled.push(order.id);
      } else {
        report.resumable.push(order.id);
      }
    }

    const settled = report.requeued.length + report.failed.length + report.unknown.length + report.cancelled.length;
    if (settled > 0) {
      console.warn(
        `[order-manager] Recovered in-flight orders: ${report.requeued.length} requeued, ` +
          `${report.failed.length} failed, ${report.unknown.length} unknown, ${report.cancelled.length} cancelled`,
      );
    }

    return report;
  }

  async getStatistics(): Promise<OrderStatistics> {
    const counts = await this.store.countByStatus();
    const stats: OrderStatistics = {
      total: 0,
      byStatus: {
        PENDING: counts.PENDING ?? 0,
        QUEUED: counts.QUEUED ?? 0,
        EXECUTING: counts.EXECUTING ?? 0,
        SUBMITTED: counts.SUBMITTED ?? 0,
        CONFIRMED: counts.CONFIRMED ?? 0,
        FAILED: counts.FAILED ?? 0,
        TIMED_OUT: counts.TIMED_OUT ?? 0,
        CANCELLED: counts.CANCELLED ?? 0,
        UNKNOWN: counts.UNKNOWN ?? 0,
      },
      active: 0,
      successRate: 0,
    };

    for (const status of ORDER_STATUSES) {
      const n = stats.byStatus[status];
      stats.total += n;
      if (!isTerminalStatus(status)) stats.active += n;
    }

    const settled = stats.byStatus.CONFIRMED + stats.byStatus.FAILED + stats.byStatus.UNKNOWN;
    stats.successRate = settled > 0 ? stats.byStatus.CONFIRMED / settled : 0;
    return stats;
  }

  async listRecent(limit: number): Promise<OrderSnapshot[]> {
    const orders = await this.store.listRecent(limit);
    return orders.map(toSnapshot);
  }
}
