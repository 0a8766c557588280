/**
 * @sluice/execution-engine - Scheduling and delivery of signed transactions
 *
 * intent -> order -> queue -> build -> simulate -> submit -> confirm -> settle
 *
 * Features:
 * - Fixed worker pool with at-most-one-in-flight execution per order
 * - Ordered backend fallback behind per-backend circuit breakers
 * - Confirmation polling on a never-regressing commitment lattice
 * - Retry transition table with exponential backoff and jitter
 * - Startup recovery that never resends a possibly-landed transaction
 */

export { ExecutionEngine, type EngineDependencies } from './engine.js';
export { TransactionExecutor } from './executor.js';
export {
  CircuitBreakerRegistry,
  type CircuitBreakerConfig,
  type CircuitStateChange,
  type CircuitStateChangeHandler,
} from './circuit-breaker.js';
export { ConfirmationPoller, type PollOutcome } from './confirmation.js';
export { classifyError } from './classify.js';
export { withDeadline, DeadlineExceededError } from './deadline.js';
export { SystemClock, VirtualClock, type Clock } from './clock.js';
export { RETRY_TABLE, decide, backoffDelay, type RetryAction, type RetryDecision } from './retry-policy.js';
export { WorkQueue, type QueueItem } from './work-queue.js';
export * from './backends/index.js';
export {
  type EngineConfig,
  type ExecutorConfig,
  type ConfirmationPolicy,
  type RetryBackoffConfig,
  type ExecuteOptions,
  type EngineEvent,
  type EngineEventType,
  type EngineEventHandler,
  type OrderStatusView,
  type SystemStatus,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_CONFIRMATION_POLICY,
} from './types.js';
