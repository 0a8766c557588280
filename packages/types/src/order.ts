import type { ExecutionError } from './errors.js';

// ============================================================================
// Trading Intents
// ============================================================================

/** Direction of a trading intent */
export type TradeAction = 'BUY' | 'SELL';

/** What the strategy layer asks us to execute */
export interface TradingIntent {
  action: TradeAction;
  /** Market symbol, e.g. "SOL-USDC" */
  market: string;
  /** Size in base units of the market (e.g. 0.1 SOL) */
  size: number;
  /** Optional price limit */
  price?: number;
  /** Strategy confidence 0-1, used for optional queue weighting */
  confidence: number;
  /**
   * Caller-supplied idempotency key. A second submission with the same key
   * returns the existing order instead of creating a new one.
   */
  clientOrderId?: string;
}

// ============================================================================
// Order Lifecycle
// ============================================================================

/** Order status in the execution state machine */
export type OrderStatus =
  | 'PENDING'
  | 'QUEUED'
  | 'EXECUTING'
  | 'SUBMITTED'
  | 'CONFIRMED'
  | 'FAILED'
  | 'TIMED_OUT'
  | 'CANCELLED'
  | 'UNKNOWN';

export const ORDER_STATUSES: readonly OrderStatus[] = [
  'PENDING',
  'QUEUED',
  'EXECUTING',
  'SUBMITTED',
  'CONFIRMED',
  'FAILED',
  'TIMED_OUT',
  'CANCELLED',
  'UNKNOWN',
];

/** Statuses from which no further transition is allowed */
export const TERMINAL_STATUSES: readonly OrderStatus[] = ['CONFIRMED', 'FAILED', 'CANCELLED', 'UNKNOWN'];

/** Statuses in which a worker owns the order (a submission may be in flight) */
export const IN_FLIGHT_STATUSES: readonly OrderStatus[] = ['EXECUTING', 'SUBMITTED'];

/**
 * Legal transitions. `EXECUTING -> PENDING` exists only for the startup
 * recovery scan; `TIMED_OUT -> QUEUED` is the retry path.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  PENDING: ['QUEUED', 'CANCELLED'],
  QUEUED: ['EXECUTING', 'CANCELLED'],
  EXECUTING: ['SUBMITTED', 'FAILED', 'TIMED_OUT', 'UNKNOWN', 'PENDING', 'CANCELLED'],
  SUBMITTED: ['CONFIRMED', 'FAILED', 'TIMED_OUT', 'UNKNOWN', 'CANCELLED'],
  TIMED_OUT: ['QUEUED', 'FAILED', 'CANCELLED'],
  CONFIRMED: [],
  FAILED: [],
  CANCELLED: [],
  UNKNOWN: [],
};

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

/** One tracked unit of work for a trading intent */
export interface Order {
  id: string;
  intent: TradingIntent;
  status: OrderStatus;
  /** Epoch ms */
  createdAt: number;
  /** Epoch ms */
  updatedAt: number;
  /** Number of completed (or crash-interrupted) attempts that reached a backend */
  attemptCount: number;
  maxRetries: number;
  lastError?: ExecutionError;
  /** Backend that produced the latest or terminal result */
  executionMethod?: string;
  /** Transaction signature or bundle id */
  resultReference?: string;
  /** Set when cancel() arrives while a submission is in flight */
  cancelRequested: boolean;
}

/** Read-only view handed out by queries */
export type OrderSnapshot = Readonly<Omit<Order, 'intent' | 'lastError'>> & {
  readonly intent: Readonly<TradingIntent>;
  readonly lastError?: Readonly<ExecutionError>;
};

/** Extra fields applied together with a status change */
export interface TransitionMetadata {
  error?: ExecutionError;
  executionMethod?: string;
  resultReference?: string;
  /** Increment attemptCount as part of this transition */
  countAttempt?: boolean;
}

/** Result of a cancellation request */
export interface CancelResult {
  accepted: boolean;
  note: string;
}
