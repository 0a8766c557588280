import {
  errorMessage,
  FatalSubmissionError,
  IllegalTransitionError,
  NotFoundError,
  ValidationError,
  type AttemptStore,
  type CancelResult,
  type ExecutionAttempt,
  type ExecutionBackend,
  type ExecutionResult,
  type OrderSnapshot,
  type Submission,
  type TradingIntent,
  type TransactionBuilder,
} from '@sluice/types';
import type { OrderManager } from '@sluice/order-manager';
import type { MetricsCollector } from '@sluice/metrics';
import { CircuitBreakerRegistry } from './circuit-breaker.js';
import { SystemClock, type Clock } from './clock.js';
import { withDeadline } from './deadline.js';
import { TransactionExecutor } from './executor.js';
import { backoffDelay, decide } from './retry-policy.js';
import { WorkQueue, type QueueItem } from './work-queue.js';
import {
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  type EngineEvent,
  type EngineEventHandler,
  type OrderStatusView,
  type SystemStatus,
} from './types.js';

/** Collaborators the engine drives */
export interface EngineDependencies {
  orders: OrderManager;
  builder: TransactionBuilder;
  /** Tried in this order */
  backends: ExecutionBackend[];
  metrics: MetricsCollector;
  /** Optional durable attempt log */
  attempts?: AttemptStore;
  clock?: Clock;
  /** Jitter source, [0, 1) */
  random?: () => number;
}

/**
 * Execution Engine
 *
 * Schedules orders onto a fixed pool of async workers:
 * 1. Admit -- PENDING orders become QUEUED while the queue has room;
 *    the rest wait in a FIFO backlog
 * 2. Execute -- a worker claims the order (QUEUED -> EXECUTING), asks the
 *    builder for a signed payload and hands it to the executor
 * 3. Settle -- the retry table maps the result to the next status:
 *    CONFIRMED, FAILED, UNKNOWN, or TIMED_OUT followed by a backoff and
 *    a return to the queue
 *
 * The QUEUED -> EXECUTING transition is the claim: only one worker can win
 * it, so an order is never in flight twice.
 */
export class ExecutionEngine {
  readonly breakers: CircuitBreakerRegistry;
  private config: EngineConfig;
  private orders: OrderManager;
  private builder: TransactionBuilder;
  private metrics: MetricsCollector;
  private attempts?: AttemptStore;
  private clock: Clock;
  private random: () => number;
  private executor: TransactionExecutor;

  private queue: WorkQueue;
  private backlog: QueueItem[] = [];
  private reserved = 0;
  private workers: Promise<void>[] = [];
  private active: Set<string> = new Set();
  private retryTasks: Set<Promise<void>> = new Set();
  private openPasses: Map<string, number> = new Map();
  private resumeWaiters: Array<() => void> = [];
  private handlers: EngineEventHandler[] = [];
  private running = false;
  /** Bumped by stop(); promotions begun before it are dropped */
  private generation = 0;
  private paused = false;
  private executionController = new AbortController();
  private retryController = new AbortController();
  private cleanupTimer?: ReturnType<typeof setInterval>;

  constructor(deps: EngineDependencies, config: Partial<EngineConfig> = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    if (this.config.maxConcurrentExecutions < 1) {
      throw new Error('maxConcurrentExecutions must be at least 1');
    }

    this.orders = deps.orders;
    this.builder = deps.builder;
    this.metrics = deps.metrics;
    this.attempts = deps.attempts;
    this.clock = deps.clock ?? new SystemClock();
    this.random = deps.random ?? Math.random;

    this.breakers = new CircuitBreakerRegistry(
      {
        threshold: this.config.circuitBreakerThreshold,
        resetTimeoutMs: this.config.circuitBreakerResetMs,
      },
      () => this.clock.now(),
    );
    this.breakers.onStateChange((change) =>
      this.emit({
        type: 'circuit_state_changed',
        backend: change.backend,
        from: change.from,
        to: change.to,
        timestamp: this.clock.now(),
        summary: `${change.backend} circuit ${change.from} -> ${change.to}`,
      }),
    );

    this.executor = new TransactionExecutor(deps.backends, this.breakers, this.config, this.clock);
    this.queue = new WorkQueue(this.config.maxQueueSize, this.config.prioritizeByConfidence);
  }

  // ==========================================================================
  // Inbound API
  // ==========================================================================

  /** Create an order for `intent` and queue it. Returns the order id. */
  async submitTradingSignal(intent: TradingIntent): Promise<string> {
    const { order, created } = await this.orders.submitOrder(intent, {
      maxRetries: this.config.maxRetries,
    });
    if (!created) return order.id;

    this.emit({
      type: 'order_submitted',
      orderId: order.id,
      intent: order.intent,
      timestamp: this.clock.now(),
      summary: `${order.intent.action} ${order.intent.size} ${order.intent.market}`,
    });

    await this.admit({ orderId: order.id, confidence: order.intent.confidence });
    return order.id;
  }

  async getOrderStatus(orderId: string): Promise<OrderStatusView> {
    const order = await this.orders.getStatus(orderId);
    const attempts = this.attempts ? await this.attempts.listByOrder(orderId) : [];
    return { ...order, attempts };
  }

  async cancel(orderId: string): Promise<CancelResult> {
    const result = await this.orders.cancel(orderId);
    if (result.accepted) {
      this.emit({
        type: 'order_cancelled',
        orderId,
        timestamp: this.clock.now(),
        summary: 'cancelled before execution',
      });
    }
    return result;
  }

  async listRecentOrders(limit: number): Promise<OrderSnapshot[]> {
    return this.orders.listRecent(limit);
  }

  async getSystemStatus(): Promise<SystemStatus> {
    return {
      running: this.running,
      paused: this.paused,
      queueDepth: this.queue.size,
      backlogDepth: this.backlog.length,
      activeCount: this.active.size,
      pendingRetries: this.retryTasks.size,
      requeuedOrders: this.openPasses.size,
      circuits: this.executor.getBackendNames().map((name) => this.breakers.getState(name)),
      metrics: this.metrics.query('5m'),
      orders: await this.orders.getStatistics(),
    };
  }

  onEvent(handler: EngineEventHandler): void {
    this.handlers.push(handler);
  }

  getConfig(): EngineConfig {
    return { ...this.config };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Recover interrupted orders, then start the workers. Recovery always
   * completes before any worker can claim an order.
   */
  async start(): Promise<void> {
    if (this.running) return;

    const report = await this.orders.recover();
    for (const orderId of report.failed) {
      await this.announceTerminal(orderId, 'order_failed');
    }
    for (const orderId of report.unknown) {
      await this.announceTerminal(orderId, 'order_unknown');
    }
    for (const orderId of report.cancelled) {
      this.emit({
        type: 'order_cancelled',
        orderId,
        timestamp: this.clock.now(),
        summary: 'cancelled during recovery',
      });
    }

    this.executionController = new AbortController();
    this.retryController = new AbortController();
    this.queue.reset();

    // Orders submitted while stopped are already in the backlog
    const waiting = new Set(this.backlog.map((item) => item.orderId));
    for (const orderId of report.resumable) {
      if (waiting.has(orderId)) continue;
      const order = await this.orders.getStatus(orderId);
      this.backlog.push({ orderId, confidence: order.intent.confidence });
    }
    this.running = true;

    this.workers = Array.from({ length: this.config.maxConcurrentExecutions }, () =>
      this.workerLoop(),
    );
    await this.promote();

    this.cleanupTimer = setInterval(() => {
      this.cleanup().catch((err: unknown) => {
        console.error(`[execution-engine] Cleanup failed: ${errorMessage(err)}`);
      });
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();

    console.log(
      `[execution-engine] Started: ${this.config.maxConcurrentExecutions} workers, ` +
        `${report.resumable.length} orders resumed`,
    );
  }

  /**
   * Stop taking work, let in-flight attempts finish for up to
   * drainTimeoutMs, then abort them. Aborted orders stay EXECUTING or
   * SUBMITTED and are settled by the next start's recovery scan; orders
   * waiting out a backoff stay TIMED_OUT.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.generation++;

    clearInterval(this.cleanupTimer);
    this.retryController.abort();
    this.queue.close();
    this.releasePaused();

    const drained = await this.waitForWorkers(this.config.drainTimeoutMs);
    if (!drained) {
      console.warn(
        `[execution-engine] ${this.active.size} executions still running after ` +
          `${this.config.drainTimeoutMs}ms, aborting`,
      );
      this.executionController.abort();
      await Promise.all(this.workers);
    }
    await Promise.all([...this.retryTasks]);
    this.workers = [];
    // Still PENDING, QUEUED or TIMED_OUT in the store; the next start resumes them
    this.backlog = [];
    this.openPasses.clear();
  }

  /** Workers finish their current order and then wait */
  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.releasePaused();
  }

  /** Delete expired terminal orders and attempts */
  async cleanup(): Promise<{ orders: number; attempts: number }> {
    const removedOrders = await this.orders.cleanup(this.config.retentionMs);
    const removedAttempts = this.attempts
      ? await this.attempts.deleteBefore(this.clock.now() - this.config.retentionMs)
      : 0;
    if (removedOrders > 0) {
      console.log(`[execution-engine] Cleanup removed ${removedOrders} orders, ${removedAttempts} attempts`);
    }
    return { orders: removedOrders, attempts: removedAttempts };
  }

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  private async admit(item: QueueItem): Promise<void> {
    this.backlog.push(item);
    await this.promote();
  }

  /** Move backlog heads into the queue while it has room */
  private async promote(): Promise<void> {
    const generation = this.generation;
    while (this.running && this.queue.hasRoom(this.reserved)) {
      const item = this.backlog.shift();
      if (!item) return;

      let ready = false;
      this.reserved++;
      try {
        ready = await this.prepare(item.orderId);
      } catch (err) {
        if (!(err instanceof IllegalTransitionError || err instanceof NotFoundError)) {
          console.error(`[execution-engine] Could not queue order ${item.orderId}: ${errorMessage(err)}`);
        }
      } finally {
        this.reserved--;
      }

      // Begun before a stop(); the next start resumes the order from the store
      if (generation !== this.generation) return;

      if (ready && !this.queue.offer(item)) {
        // Closed by stop(); QUEUED orders are resumed on the next start
        console.warn(`[execution-engine] Queue closed, order ${item.orderId} left QUEUED`);
      }
    }
  }

  /** Move one backlog order to QUEUED. False when it should not run. */
  private async prepare(orderId: string): Promise<boolean> {
    const order = await this.orders.getStatus(orderId);
    if (order.status === 'QUEUED') return true;

    if (order.status === 'TIMED_OUT' && order.cancelRequested) {
      await this.orders.transition(orderId, 'CANCELLED');
      this.openPasses.delete(orderId);
      this.emit({
        type: 'order_cancelled',
        orderId,
        timestamp: this.clock.now(),
        summary: 'cancelled before retrying',
      });
      return false;
    }

    await this.orders.transition(orderId, 'QUEUED');
    return true;
  }

  private async workerLoop(): Promise<void> {
    for (;;) {
      const item = await this.queue.take();
      if (!item) return;

      this.promote().catch((err: unknown) => {
        console.error(`[execution-engine] Backlog promotion failed: ${errorMessage(err)}`);
      });

      await this.waitIfPaused();
      if (!this.running) return; // still QUEUED in the store; resumed on next start

      this.active.add(item.orderId);
      try {
        await this.processOrder(item);
      } catch (err) {
        console.error(`[execution-engine] Order ${item.orderId} processing error: ${errorMessage(err)}`);
      } finally {
        this.active.delete(item.orderId);
      }
    }
  }

  private async processOrder(item: QueueItem): Promise<void> {
    let order: OrderSnapshot;
    try {
      order = await this.orders.transition(item.orderId, 'EXECUTING');
    } catch (err) {
      // Cancelled or claimed elsewhere while it sat in the queue
      if (err instanceof IllegalTransitionError || err instanceof NotFoundError) return;
      throw err;
    }

    const signal = this.executionController.signal;
    let result: ExecutionResult;
    try {
      const payload = await withDeadline(this.config.executionTimeoutMs, signal, (s) =>
        this.builder.build(order.intent, s),
      );
      result = await this.executor.execute(payload, {
        orderId: order.id,
        signal,
        onSubmitted: (backend, submission) => this.markSubmitted(order.id, backend, submission),
      });
    } catch (err) {
      result = signal.aborted ? { status: 'interrupted', attempts: [] } : this.builderFailure(err);
    }

    await this.settle(item, result);
  }

  private builderFailure(err: unknown): ExecutionResult {
    const message = `Transaction build failed: ${errorMessage(err)}`;
    if (err instanceof ValidationError || err instanceof FatalSubmissionError) {
      return { status: 'failed', error: { kind: err.kind, message }, attempts: [] };
    }
    return { status: 'failed', error: { kind: 'TransientNetworkError', message }, attempts: [] };
  }

  private async markSubmitted(orderId: string, backend: string, submission: Submission): Promise<void> {
    const order = await this.orders.getStatus(orderId);
    if (order.status !== 'EXECUTING') return; // a fallback backend after an earlier broadcast
    await this.orders.transition(orderId, 'SUBMITTED', {
      executionMethod: backend,
      resultReference: submission.reference,
    });
  }

  /** Apply the retry table to one pass's result */
  private async settle(item: QueueItem, result: ExecutionResult): Promise<void> {
    const orderId = item.orderId;
    await this.recordAttempts(result.attempts);

    const current = await this.orders.getStatus(orderId);
    const decision = decide(result, current.attemptCount, current.maxRetries);
    const countAttempt = decision.countsAttempt;

    switch (result.status) {
      case 'interrupted':
        return;

      case 'confirmed': {
        const meta = { executionMethod: result.backend, resultReference: result.reference };
        if (current.status === 'EXECUTING') {
          await this.orders.transition(orderId, 'SUBMITTED', meta);
        }
        await this.orders.transition(orderId, 'CONFIRMED', { ...meta, countAttempt });
        this.openPasses.delete(orderId);
        this.emit({
          type: 'order_confirmed',
          orderId,
          backend: result.backend,
          reference: result.reference,
          timestamp: this.clock.now(),
          summary: `confirmed via ${result.backend} (${result.level})`,
        });
        return;
      }

      case 'unknown':
        await this.orders.transition(orderId, 'UNKNOWN', {
          countAttempt,
          error: result.error,
          executionMethod: result.backend,
          resultReference: result.reference,
        });
        this.openPasses.delete(orderId);
        this.emit({
          type: 'order_unknown',
          orderId,
          error: result.error,
          timestamp: this.clock.now(),
          summary: result.error.message,
        });
        return;

      case 'failed':
        break;
    }

    const meta = {
      countAttempt,
      error: result.error,
      executionMethod: result.backend,
      resultReference: result.reference,
    };

    if (decision.action === 'fail') {
      await this.orders.transition(orderId, 'FAILED', meta);
      this.openPasses.delete(orderId);
      this.emit({
        type: 'order_failed',
        orderId,
        error: result.error,
        timestamp: this.clock.now(),
        summary: `${result.error.kind}: ${result.error.message}`,
      });
      return;
    }

    // retry or requeue
    if (current.cancelRequested) {
      await this.orders.transition(orderId, 'CANCELLED', meta);
      this.openPasses.delete(orderId);
      this.emit({
        type: 'order_cancelled',
        orderId,
        timestamp: this.clock.now(),
        summary: 'cancelled instead of retrying',
      });
      return;
    }

    await this.orders.transition(orderId, 'TIMED_OUT', meta);

    const retryNumber =
      decision.action === 'retry' ? decision.attemptCount : (this.openPasses.get(orderId) ?? 0) + 1;
    if (decision.action === 'requeue') this.openPasses.set(orderId, retryNumber);
    const delayMs = backoffDelay(this.config.retry, retryNumber, this.random);

    this.emit({
      type: 'order_retry_scheduled',
      orderId,
      attemptCount: decision.attemptCount,
      delayMs,
      error: result.error,
      timestamp: this.clock.now(),
      summary: `retrying in ${delayMs}ms after ${result.error.kind}`,
    });
    this.scheduleRetry(item, delayMs);
  }

  private scheduleRetry(item: QueueItem, delayMs: number): void {
    const task: Promise<void> = this.retryAfter(item, delayMs)
      .catch((err: unknown) => {
        console.error(`[execution-engine] Retry of order ${item.orderId} failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.retryTasks.delete(task);
      });
    this.retryTasks.add(task);
  }

  private async retryAfter(item: QueueItem, delayMs: number): Promise<void> {
    const signal = this.retryController.signal;
    try {
      await this.clock.sleep(delayMs, signal);
    } catch (err) {
      if (signal.aborted) return; // stays TIMED_OUT until the next start
      throw err;
    }

    const order = await this.orders.getStatus(item.orderId);
    if (order.status !== 'TIMED_OUT') {
      // cancelled during the backoff
      this.openPasses.delete(item.orderId);
      return;
    }

    if (order.cancelRequested) {
      await this.orders.transition(item.orderId, 'CANCELLED');
      this.openPasses.delete(item.orderId);
      this.emit({
        type: 'order_cancelled',
        orderId: item.orderId,
        timestamp: this.clock.now(),
        summary: 'cancelled during backoff',
      });
      return;
    }

    await this.admit(item);
  }

  // ---- Helpers ----

  private async recordAttempts(attempts: ExecutionAttempt[]): Promise<void> {
    for (const attempt of attempts) {
      this.metrics.record(attempt);
      if (!this.attempts) continue;
      try {
        await this.attempts.append(attempt);
      } catch (err) {
        console.error(
          `[execution-engine] Could not persist attempt for order ${attempt.orderId}: ${errorMessage(err)}`,
        );
      }
    }
  }

  private async announceTerminal(
    orderId: string,
    type: 'order_failed' | 'order_unknown',
  ): Promise<void> {
    const order = await this.orders.getStatus(orderId);
    const error = order.lastError ?? { kind: 'interrupted', message: 'Recovered after restart' };
    this.emit({
      type,
      orderId,
      error: { ...error },
      timestamp: this.clock.now(),
      summary: `recovered as ${order.status}: ${error.message}`,
    });
  }

  private waitIfPaused(): Promise<void> {
    if (!this.paused || !this.running) return Promise.resolve();
    return new Promise((resolve) => this.resumeWaiters.push(resolve));
  }

  private releasePaused(): void {
    for (const resolve of this.resumeWaiters.splice(0)) resolve();
  }

  private async waitForWorkers(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([Promise.all(this.workers).then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private emit(event: EngineEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err) {
        console.warn('[execution-engine] Event handler error:', err);
      }
    }
  }
}
