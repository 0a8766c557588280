import type { OrderStatus } from './order.js';

// ============================================================================
// Error Taxonomy
// ============================================================================

/** Failure kinds that drive retry-vs-terminate decisions */
export type ErrorKind =
  | 'ValidationError'
  | 'TransientNetworkError'
  | 'FatalSubmissionError'
  | 'CircuitOpenError'
  | 'UnknownOutcomeError';

/** Kinds that can appear in an order's lastError */
export type ExecutionErrorKind = ErrorKind | 'interrupted';

/** Serializable error carried on results and persisted on orders */
export interface ExecutionError {
  kind: ExecutionErrorKind;
  message: string;
}

/**
 * Base class for every error the engine raises on purpose.
 * `kind` lets callers switch without instanceof chains.
 */
export abstract class SluiceError extends Error {
  abstract readonly kind: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed intent; rejected at submission, never retried */
export class ValidationError extends SluiceError {
  readonly kind = 'ValidationError';
}

/** Timeout, server error or rate limit; retried with backoff */
export class TransientNetworkError extends SluiceError {
  readonly kind = 'TransientNetworkError';
}

/** Invalid signature, insufficient balance, program rejection; never retried */
export class FatalSubmissionError extends SluiceError {
  readonly kind = 'FatalSubmissionError';
}

/** Target backend unusable (circuit open) */
export class CircuitOpenError extends SluiceError {
  readonly kind = 'CircuitOpenError';
}

/** Broadcast happened but the outcome could not be established */
export class UnknownOutcomeError extends SluiceError {
  readonly kind = 'UnknownOutcomeError';
}

export class NotFoundError extends SluiceError {
  readonly kind = 'NotFoundError';

  constructor(readonly orderId: string) {
    super(`Order not found: ${orderId}`);
  }
}

export class IllegalTransitionError extends SluiceError {
  readonly kind = 'IllegalTransitionError';

  constructor(
    readonly orderId: string,
    readonly from: OrderStatus,
    readonly to: OrderStatus,
  ) {
    super(`Illegal transition for order ${orderId}: ${from} -> ${to}`);
  }
}

/** Errors whose kind belongs to the execution taxonomy */
export type TaxonomyError =
  | ValidationError
  | TransientNetworkError
  | FatalSubmissionError
  | CircuitOpenError
  | UnknownOutcomeError;

export function isTaxonomyError(err: unknown): err is TaxonomyError {
  return (
    err instanceof ValidationError ||
    err instanceof TransientNetworkError ||
    err instanceof FatalSubmissionError ||
    err instanceof CircuitOpenError ||
    err instanceof UnknownOutcomeError
  );
}

/** Normalise anything thrown into a message string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toExecutionError(err: TaxonomyError): ExecutionError {
  return { kind: err.kind, message: err.message };
}
