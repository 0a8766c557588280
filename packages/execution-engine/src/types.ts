import type {
  CircuitBreakerState,
  CircuitState,
  ExecutionAttempt,
  ExecutionError,
  OrderSnapshot,
  Submission,
  TradingIntent,
  WindowStats,
} from '@sluice/types';
import type { OrderStatistics } from '@sluice/order-manager';

// ============================================================================
// Configuration
// ============================================================================

/** Exponential backoff with optional full jitter */
export interface RetryBackoffConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Full jitter: pick uniformly in [0, delay) */
  jitter: boolean;
}

/** Confirmation polling schedule */
export interface ConfirmationPolicy {
  initialIntervalMs: number;
  maxIntervalMs: number;
  backoffFactor: number;
  /** Total budget from broadcast to giving up with UNKNOWN */
  maxWaitMs: number;
  /** Per-poll timeout */
  pollTimeoutMs: number;
  /** Commitment that counts as success */
  targetLevel: 'confirmed' | 'finalized';
}

/** Executor-level settings */
export interface ExecutorConfig {
  /** Bound on each build, submit and simulate call */
  executionTimeoutMs: number;
  simulateBeforeSend: boolean;
  confirmation: ConfirmationPolicy;
}

/** Configuration for the execution engine */
export interface EngineConfig extends ExecutorConfig {
  /** Worker count */
  maxConcurrentExecutions: number;
  /** Retries granted to each new order */
  maxRetries: number;
  retry: RetryBackoffConfig;
  /** Consecutive failures that open a backend's circuit */
  circuitBreakerThreshold: number;
  /** How long a circuit stays open before one trial is let through */
  circuitBreakerResetMs: number;
  /** Queue capacity; orders beyond it wait PENDING in the backlog */
  maxQueueSize: number;
  /** How long stop() waits for in-flight attempts before aborting them */
  drainTimeoutMs: number;
  cleanupIntervalMs: number;
  /** Terminal orders older than this are deleted by cleanup */
  retentionMs: number;
  /** Dequeue higher-confidence intents first (FIFO among equals) */
  prioritizeByConfidence: boolean;
}

export const DEFAULT_CONFIRMATION_POLICY: ConfirmationPolicy = {
  initialIntervalMs: 500,
  maxIntervalMs: 4_000,
  backoffFactor: 1.5,
  maxWaitMs: 60_000,
  pollTimeoutMs: 5_000,
  targetLevel: 'confirmed',
};

/** Default engine configuration */
export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxConcurrentExecutions: 4,
  executionTimeoutMs: 30_000,
  simulateBeforeSend: false,
  confirmation: DEFAULT_CONFIRMATION_POLICY,
  maxRetries: 3,
  retry: {
    baseDelayMs: 500,
    maxDelayMs: 30_000,
    multiplier: 2,
    jitter: true,
  },
  circuitBreakerThreshold: 3,
  circuitBreakerResetMs: 60_000,
  maxQueueSize: 1_000,
  drainTimeoutMs: 10_000,
  cleanupIntervalMs: 60 * 60 * 1000,
  retentionMs: 7 * 24 * 60 * 60 * 1000,
  prioritizeByConfidence: false,
};

// ============================================================================
// Executor
// ============================================================================

export interface ExecuteOptions {
  orderId: string;
  /** Aborted when the engine shuts down */
  signal?: AbortSignal;
  /** Called after a backend accepted the broadcast, before polling */
  onSubmitted?: (backend: string, submission: Submission) => Promise<void>;
}

// ============================================================================
// Engine Events
// ============================================================================

interface EventBase {
  timestamp: number;
  summary: string;
}

/** Notification events, in order of occurrence per order */
export type EngineEvent =
  | (EventBase & { type: 'order_submitted'; orderId: string; intent: TradingIntent })
  | (EventBase & { type: 'order_confirmed'; orderId: string; backend: string; reference: string })
  | (EventBase & { type: 'order_failed'; orderId: string; error: ExecutionError })
  | (EventBase & { type: 'order_unknown'; orderId: string; error: ExecutionError })
  | (EventBase & { type: 'order_cancelled'; orderId: string })
  | (EventBase & {
      type: 'order_retry_scheduled';
      orderId: string;
      attemptCount: number;
      delayMs: number;
      error: ExecutionError;
    })
  | (EventBase & { type: 'circuit_state_changed'; backend: string; from: CircuitState; to: CircuitState });

export type EngineEventType = EngineEvent['type'];

export type EngineEventHandler = (event: EngineEvent) => void;

// ============================================================================
// Status
// ============================================================================

/** Order snapshot plus its recorded attempts */
export type OrderStatusView = OrderSnapshot & { attempts: ExecutionAttempt[] };

export interface SystemStatus {
  running: boolean;
  paused: boolean;
  queueDepth: number;
  backlogDepth: number;
  activeCount: number;
  pendingRetries: number;
  /** Orders requeued behind open circuits that have not settled yet */
  requeuedOrders: number;
  circuits: CircuitBreakerState[];
  metrics: WindowStats;
  orders: OrderStatistics;
}
