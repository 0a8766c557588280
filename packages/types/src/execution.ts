import type { ErrorKind, ExecutionError } from './errors.js';
import type { TradingIntent } from './order.js';

// ============================================================================
// Payloads & Collaborators
// ============================================================================

/**
 * Signed, finalized transactions produced by the external builder.
 * More than one transaction means the group must land atomically.
 */
export interface SignedPayload {
  transactions: Uint8Array[];
}

/** External collaborator that turns an intent into signed bytes */
export interface TransactionBuilder {
  /** `signal` aborts on the engine's deadline or shutdown */
  build(intent: TradingIntent, signal?: AbortSignal): Promise<SignedPayload>;
}

// ============================================================================
// Confirmation
// ============================================================================

/** Confirmation lattice: pending < submitted < confirmed < finalized */
export type ConfirmationLevel = 'pending' | 'submitted' | 'confirmed' | 'finalized';

export const CONFIRMATION_RANK: Readonly<Record<ConfirmationLevel, number>> = {
  pending: 0,
  submitted: 1,
  confirmed: 2,
  finalized: 3,
};

/** One status observation returned by a backend */
export type ConfirmationStatus =
  | {
      state: 'progress';
      level: ConfirmationLevel;
      /** How many constituents of a group are known to have landed */
      landedCount?: number;
      slot?: number;
    }
  | {
      /** Landed on chain but the program rejected it */
      state: 'failed';
      error: string;
      slot?: number;
    }
  | {
      /** Definitively never landed (expired, bundle rejected) */
      state: 'dropped';
      reason: string;
      /** How many constituents landed before the rest were rejected */
      landedCount?: number;
    }
  | {
      /** No record of the transaction anywhere */
      state: 'not_found';
    };

// ============================================================================
// Backends
// ============================================================================

/** Handle returned by a successful broadcast */
export interface Submission {
  /** Opaque confirmation handle (signature or bundle id) */
  reference: string;
  /** Transaction signatures in the group, in payload order */
  signatures: string[];
  submittedAt: number;
}

/** What a backend found when looking a payload up without its submission handle */
export interface Reconciliation {
  /** Identity the payload would have had if it was broadcast */
  submission: Submission;
  status: ConfirmationStatus;
}

/** Dry-run verdict */
export type SimulationResult =
  | { ok: true; unitsConsumed?: number }
  | { ok: false; error: string; transient: boolean };

/**
 * One interchangeable delivery channel. Implementations may throw; the
 * executor classifies whatever escapes.
 */
export interface ExecutionBackend {
  readonly name: string;
  /** Whether a multi-transaction payload lands all-or-nothing here */
  readonly supportsAtomicGroups: boolean;
  submit(payload: SignedPayload, signal: AbortSignal): Promise<Submission>;
  confirm(submission: Submission, signal: AbortSignal): Promise<ConfirmationStatus>;
  simulate?(payload: SignedPayload, signal: AbortSignal): Promise<SimulationResult>;
  /** Look the payload up without a submission handle (after a submit timeout) */
  reconcile?(payload: SignedPayload, signal: AbortSignal): Promise<Reconciliation>;
  /** Called once the executor stops tracking a submission */
  release?(submission: Submission): void;
}

// ============================================================================
// Attempts & Results
// ============================================================================

export type AttemptOutcome = 'SUCCESS' | 'FAILURE' | 'TIMEOUT' | 'UNKNOWN';

/** One try of one order against one backend. Immutable once written. */
export interface ExecutionAttempt {
  readonly orderId: string;
  readonly backend: string;
  readonly startedAt: number;
  readonly endedAt: number;
  readonly outcome: AttemptOutcome;
  readonly errorKind?: ErrorKind;
  readonly latencyMs: number;
}

/** Structured outcome of Executor.execute(). Never an exception. */
export type ExecutionResult =
  | {
      status: 'confirmed';
      backend: string;
      reference: string;
      signatures: string[];
      level: ConfirmationLevel;
      attempts: ExecutionAttempt[];
    }
  | {
      status: 'failed';
      error: ExecutionError & { kind: ErrorKind };
      backend?: string;
      reference?: string;
      attempts: ExecutionAttempt[];
    }
  | {
      status: 'unknown';
      error: ExecutionError & { kind: 'UnknownOutcomeError' };
      backend: string;
      reference?: string;
      attempts: ExecutionAttempt[];
    }
  | {
      /** Aborted by engine shutdown; the order is left for recovery */
      status: 'interrupted';
      backend?: string;
      reference?: string;
      attempts: ExecutionAttempt[];
    };

// ============================================================================
// Circuit Breaking
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

/** Per-backend health gate */
export interface CircuitBreakerState {
  backend: string;
  consecutiveFailures: number;
  state: CircuitState;
  openedAt?: number;
  resetTimeoutMs: number;
}
