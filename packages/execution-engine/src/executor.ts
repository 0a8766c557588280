import {
  CircuitOpenError,
  CONFIRMATION_RANK,
  errorMessage,
  FatalSubmissionError,
  TransientNetworkError,
  UnknownOutcomeError,
  ValidationError,
  type AttemptOutcome,
  type ConfirmationLevel,
  type ErrorKind,
  type ExecutionAttempt,
  type ExecutionBackend,
  type ExecutionResult,
  type Reconciliation,
  type SignedPayload,
  type Submission,
  type TaxonomyError,
} from '@sluice/types';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import { classifyError } from './classify.js';
import type { Clock } from './clock.js';
import { ConfirmationPoller, type PollOutcome } from './confirmation.js';
import { DeadlineExceededError, withDeadline } from './deadline.js';
import type { ExecuteOptions, ExecutorConfig } from './types.js';

/** How one backend try ended */
type BackendVerdict =
  | {
      kind: 'confirmed';
      submission: Submission;
      level: ConfirmationLevel;
    }
  /** Stop here: the payload itself is bad */
  | { kind: 'fatal'; error: FatalSubmissionError | ValidationError; reference?: string }
  /** Stop here: the broadcast may have landed */
  | { kind: 'unknown'; error: UnknownOutcomeError; reference?: string }
  /** Try the next backend */
  | { kind: 'transient'; error: TaxonomyError; reference?: string }
  | { kind: 'interrupted'; reference?: string };

/**
 * Transaction Executor
 *
 * Delivers one signed payload through the ordered backend list:
 * 1. Skip backends whose circuit is open, or that cannot deliver the
 *    payload atomically
 * 2. Simulate (optional) -- a deterministic rejection stops everything
 * 3. Submit under the execution timeout; on timeout, reconcile once
 * 4. Poll for confirmation
 * 5. Report to the breaker and record one ExecutionAttempt
 *
 * Transient failures fall through to the next backend. Fatal and ambiguous
 * outcomes stop the chain. `execute` never throws.
 */
export class TransactionExecutor {
  private poller: ConfirmationPoller;

  constructor(
    private backends: ExecutionBackend[],
    private breakers: CircuitBreakerRegistry,
    private config: ExecutorConfig,
    private clock: Clock,
  ) {
    if (backends.length === 0) {
      throw new Error('TransactionExecutor needs at least one backend');
    }
    this.poller = new ConfirmationPoller(config.confirmation, clock);
  }

  getBackendNames(): string[] {
    return this.backends.map((b) => b.name);
  }

  async execute(payload: SignedPayload, opts: ExecuteOptions): Promise<ExecutionResult> {
    const attempts: ExecutionAttempt[] = [];
    const groupSize = payload.transactions.length;

    if (groupSize === 0) {
      return {
        status: 'failed',
        error: { kind: 'ValidationError', message: 'Payload contains no transactions' },
        attempts,
      };
    }

    let lastFailure: { error: TaxonomyError; backend: string; reference?: string } | undefined;
    let skippedOpen = 0;

    for (const backend of this.backends) {
      if (opts.signal?.aborted) {
        return { status: 'interrupted', attempts };
      }

      if (groupSize > 1 && !backend.supportsAtomicGroups) {
        lastFailure ??= {
          error: new FatalSubmissionError(
            `${backend.name} cannot deliver a ${groupSize}-transaction group atomically`,
          ),
          backend: backend.name,
        };
        continue;
      }

      if (!this.breakers.tryAcquire(backend.name)) {
        skippedOpen++;
        continue;
      }

      const verdict = await this.tryBackend(backend, payload, opts, attempts);

      switch (verdict.kind) {
        case 'confirmed':
          return {
            status: 'confirmed',
            backend: backend.name,
            reference: verdict.submission.reference,
            signatures: verdict.submission.signatures,
            level: verdict.level,
            attempts,
          };
        case 'fatal':
          return {
            status: 'failed',
            error: { kind: verdict.error.kind, message: verdict.error.message },
            backend: backend.name,
            reference: verdict.reference,
            attempts,
          };
        case 'unknown':
          return {
            status: 'unknown',
            error: { kind: 'UnknownOutcomeError', message: verdict.error.message },
            backend: backend.name,
            reference: verdict.reference,
            attempts,
          };
        case 'interrupted':
          return { status: 'interrupted', backend: backend.name, reference: verdict.reference, attempts };
        case 'transient':
          lastFailure = { error: verdict.error, backend: backend.name, reference: verdict.reference };
          break;
      }
    }

    if (attempts.length === 0 && skippedOpen > 0) {
      const open = new CircuitOpenError(
        `No backend available: ${skippedOpen} circuit(s) open`,
      );
      return { status: 'failed', error: { kind: open.kind, message: open.message }, attempts };
    }

    const failure = lastFailure ?? {
      error: new TransientNetworkError('No backend accepted the payload'),
      backend: undefined,
      reference: undefined,
    };
    return {
      status: 'failed',
      error: { kind: failure.error.kind, message: failure.error.message },
      backend: failure.backend,
      reference: failure.reference,
      attempts,
    };
  }

  // ---- Private methods ----

  private async tryBackend(
    backend: ExecutionBackend,
    payload: SignedPayload,
    opts: ExecuteOptions,
    attempts: ExecutionAttempt[],
  ): Promise<BackendVerdict> {
    const startedAt = this.clock.now();
    const record = (outcome: AttemptOutcome, errorKind?: ErrorKind): void => {
      const endedAt = this.clock.now();
      attempts.push(
        Object.freeze({
          orderId: opts.orderId,
          backend: backend.name,
          startedAt,
          endedAt,
          outcome,
          errorKind,
          latencyMs: endedAt - startedAt,
        }),
      );
    };

    // Step 1: Simulate (optional)
    const rejection = await this.simulate(backend, payload, opts.signal);
    if (rejection === 'interrupted') {
      this.breakers.release(backend.name);
      return { kind: 'interrupted' };
    }
    if (rejection) {
      // The backend answered correctly; the payload is what failed
      this.breakers.release(backend.name);
      return { kind: 'fatal', error: rejection };
    }

    // Step 2: Submit
    let submission: Submission;
    try {
      submission = await withDeadline(this.config.executionTimeoutMs, opts.signal, (s) =>
        backend.submit(payload, s),
      );
    } catch (err) {
      if (opts.signal?.aborted) {
        this.breakers.release(backend.name);
        return { kind: 'interrupted' };
      }
      if (err instanceof DeadlineExceededError) {
        return this.reconcileAfterTimeout(backend, payload, opts, record);
      }

      const classified = classifyError(err);
      switch (classified.kind) {
        case 'FatalSubmissionError':
        case 'ValidationError':
          this.breakers.release(backend.name);
          record('FAILURE', classified.kind);
          return { kind: 'fatal', error: classified };
        case 'UnknownOutcomeError':
          this.breakers.release(backend.name);
          record('UNKNOWN', classified.kind);
          return { kind: 'unknown', error: classified };
        default:
          this.breakers.recordFailure(backend.name);
          record('FAILURE', 'TransientNetworkError');
          return { kind: 'transient', error: new TransientNetworkError(classified.message) };
      }
    }

    await this.notifySubmitted(backend, submission, opts);

    // Step 3: Confirm
    return this.confirm(backend, payload, submission, opts.signal, record);
  }

  /** Returns the rejection, 'interrupted', or null to go ahead */
  private async simulate(
    backend: ExecutionBackend,
    payload: SignedPayload,
    signal?: AbortSignal,
  ): Promise<FatalSubmissionError | 'interrupted' | null> {
    const simulate = backend.simulate?.bind(backend);
    if (!this.config.simulateBeforeSend || !simulate) return null;

    try {
      const result = await withDeadline(this.config.executionTimeoutMs, signal, (s) =>
        simulate(payload, s),
      );
      if (!result.ok && !result.transient) {
        return new FatalSubmissionError(`Simulation failed on ${backend.name}: ${result.error}`);
      }
      if (!result.ok) {
        console.warn(`[executor] Simulation on ${backend.name} inconclusive, sending anyway: ${result.error}`);
      }
      return null;
    } catch (err) {
      if (signal?.aborted) return 'interrupted';
      console.warn(`[executor] Simulation on ${backend.name} errored, sending anyway: ${errorMessage(err)}`);
      return null;
    }
  }

  private async confirm(
    backend: ExecutionBackend,
    payload: SignedPayload,
    submission: Submission,
    signal: AbortSignal | undefined,
    record: (outcome: AttemptOutcome, errorKind?: ErrorKind) => void,
  ): Promise<BackendVerdict> {
    const reference = submission.reference;
    let outcome: PollOutcome;
    try {
      outcome = await this.poller.waitFor(backend, submission, signal);
    } catch (err) {
      backend.release?.(submission);
      this.breakers.release(backend.name);
      if (signal?.aborted) {
        return { kind: 'interrupted', reference };
      }
      record('UNKNOWN', 'UnknownOutcomeError');
      return {
        kind: 'unknown',
        error: new UnknownOutcomeError(`Polling ${reference} failed: ${errorMessage(err)}`),
        reference,
      };
    }

    backend.release?.(submission);
    const groupSize = payload.transactions.length;

    switch (outcome.kind) {
      case 'confirmed':
        if (groupSize > 1 && outcome.landedCount !== undefined && outcome.landedCount < groupSize) {
          this.breakers.release(backend.name);
          record('UNKNOWN', 'UnknownOutcomeError');
          return {
            kind: 'unknown',
            error: new UnknownOutcomeError(
              `Only ${outcome.landedCount} of ${groupSize} transactions in ${reference} landed`,
            ),
            reference,
          };
        }
        this.breakers.recordSuccess(backend.name);
        record('SUCCESS');
        return { kind: 'confirmed', submission, level: outcome.level };

      case 'failed':
        this.breakers.release(backend.name);
        record('FAILURE', 'FatalSubmissionError');
        return {
          kind: 'fatal',
          error: new FatalSubmissionError(`Transaction ${reference} failed on chain: ${outcome.error}`),
          reference,
        };

      case 'dropped':
        if (outcome.landedCount !== undefined && outcome.landedCount > 0) {
          this.breakers.release(backend.name);
          record('UNKNOWN', 'UnknownOutcomeError');
          return {
            kind: 'unknown',
            error: new UnknownOutcomeError(
              `${reference} dropped after ${outcome.landedCount} of ${groupSize} transactions landed`,
            ),
            reference,
          };
        }
        this.breakers.recordFailure(backend.name);
        record('FAILURE', 'TransientNetworkError');
        return {
          kind: 'transient',
          error: new TransientNetworkError(`${reference} dropped: ${outcome.reason}`),
          reference,
        };

      case 'unknown':
        this.breakers.release(backend.name);
        record('UNKNOWN', 'UnknownOutcomeError');
        return {
          kind: 'unknown',
          error: new UnknownOutcomeError(
            `No terminal confirmation for ${reference} within ${this.config.confirmation.maxWaitMs}ms ` +
              `(highest level: ${outcome.highestLevel})`,
          ),
          reference,
        };
    }
  }

  /**
   * The submit call timed out, so the broadcast may or may not have gone
   * out. One lookup decides between success, UNKNOWN, fatal and a safe
   * retry.
   */
  private async reconcileAfterTimeout(
    backend: ExecutionBackend,
    payload: SignedPayload,
    opts: ExecuteOptions,
    record: (outcome: AttemptOutcome, errorKind?: ErrorKind) => void,
  ): Promise<BackendVerdict> {
    const timeoutMessage = `${backend.name} submit timed out after ${this.config.executionTimeoutMs}ms`;
    const reconcile = backend.reconcile?.bind(backend);

    if (!reconcile) {
      this.breakers.recordFailure(backend.name);
      record('UNKNOWN', 'UnknownOutcomeError');
      return {
        kind: 'unknown',
        error: new UnknownOutcomeError(`${timeoutMessage}; backend cannot reconcile`),
      };
    }

    let found: Reconciliation;
    try {
      found = await withDeadline(this.config.confirmation.pollTimeoutMs, opts.signal, (s) =>
        reconcile(payload, s),
      );
    } catch (err) {
      if (opts.signal?.aborted) {
        this.breakers.release(backend.name);
        return { kind: 'interrupted' };
      }
      this.breakers.recordFailure(backend.name);
      record('UNKNOWN', 'UnknownOutcomeError');
      return {
        kind: 'unknown',
        error: new UnknownOutcomeError(`${timeoutMessage}; reconciliation failed: ${errorMessage(err)}`),
      };
    }

    const { submission, status } = found;
    backend.release?.(submission);
    const reference = submission.reference;
    const target = CONFIRMATION_RANK[this.config.confirmation.targetLevel];

    switch (status.state) {
      case 'progress': {
        const landed = CONFIRMATION_RANK[status.level] >= target;
        const complete =
          status.landedCount === undefined || status.landedCount >= payload.transactions.length;
        if (landed && complete) {
          await this.notifySubmitted(backend, submission, opts);
          this.breakers.recordSuccess(backend.name);
          record('SUCCESS');
          return { kind: 'confirmed', submission, level: status.level };
        }
        this.breakers.release(backend.name);
        record('UNKNOWN', 'UnknownOutcomeError');
        return {
          kind: 'unknown',
          error: new UnknownOutcomeError(`${timeoutMessage}; ${reference} seen at ${status.level}`),
          reference,
        };
      }
      case 'failed':
        this.breakers.release(backend.name);
        record('FAILURE', 'FatalSubmissionError');
        return {
          kind: 'fatal',
          error: new FatalSubmissionError(`Transaction ${reference} failed on chain: ${status.error}`),
          reference,
        };
      case 'dropped':
      case 'not_found':
        this.breakers.recordFailure(backend.name);
        record('TIMEOUT', 'TransientNetworkError');
        return { kind: 'transient', error: new TransientNetworkError(timeoutMessage) };
    }
  }

  private async notifySubmitted(
    backend: ExecutionBackend,
    submission: Submission,
    opts: ExecuteOptions,
  ): Promise<void> {
    if (!opts.onSubmitted) return;
    try {
      await opts.onSubmitted(backend.name, submission);
    } catch (err) {
      console.error(`[executor] onSubmitted failed for order ${opts.orderId}: ${errorMessage(err)}`);
    }
  }
}
