import type { ErrorKind, ExecutionResult } from '@sluice/types';
import type { RetryBackoffConfig } from './types.js';

/** What the engine does with an order after one execution pass */
export type RetryAction = 'confirm' | 'fail' | 'unknown' | 'retry' | 'requeue' | 'leave';

interface RetryRule {
  /** Action while the order still has retries */
  withRetries: RetryAction;
  /** Action once attemptCount exceeds maxRetries */
  exhausted: RetryAction;
  /** Whether this pass counts against maxRetries */
  countsAttempt: boolean;
}

/**
 * Retry transition table, keyed by failure kind.
 *
 * | kind                  | retries left | exhausted | counted |
 * |-----------------------|--------------|-----------|---------|
 * | ValidationError       | fail         | fail      | yes     |
 * | FatalSubmissionError  | fail         | fail      | yes     |
 * | UnknownOutcomeError   | unknown      | unknown   | yes     |
 * | CircuitOpenError      | requeue      | requeue   | no      |
 * | TransientNetworkError | retry        | fail      | yes     |
 */
export const RETRY_TABLE: Readonly<Record<ErrorKind, RetryRule>> = {
  ValidationError: { withRetries: 'fail', exhausted: 'fail', countsAttempt: true },
  FatalSubmissionError: { withRetries: 'fail', exhausted: 'fail', countsAttempt: true },
  UnknownOutcomeError: { withRetries: 'unknown', exhausted: 'unknown', countsAttempt: true },
  CircuitOpenError: { withRetries: 'requeue', exhausted: 'requeue', countsAttempt: false },
  TransientNetworkError: { withRetries: 'retry', exhausted: 'fail', countsAttempt: true },
};

export interface RetryDecision {
  action: RetryAction;
  countsAttempt: boolean;
  /** attemptCount once this pass is counted */
  attemptCount: number;
}

/**
 * Decide the next step for an order whose pass produced `result`.
 * `attemptCount` is the order's count before this pass.
 */
export function decide(result: ExecutionResult, attemptCount: number, maxRetries: number): RetryDecision {
  switch (result.status) {
    case 'confirmed':
      return { action: 'confirm', countsAttempt: true, attemptCount: attemptCount + 1 };
    case 'interrupted':
      // Left in flight for the startup recovery scan to count
      return { action: 'leave', countsAttempt: false, attemptCount };
    case 'unknown':
      return { action: 'unknown', countsAttempt: true, attemptCount: attemptCount + 1 };
    case 'failed': {
      const rule = RETRY_TABLE[result.error.kind];
      const after = rule.countsAttempt ? attemptCount + 1 : attemptCount;
      return {
        action: after <= maxRetries ? rule.withRetries : rule.exhausted,
        countsAttempt: rule.countsAttempt,
        attemptCount: after,
      };
    }
  }
}

/**
 * Delay before retry number `retry` (1-based): exponential, capped, and with
 * full jitter drawn from `random` when enabled.
 */
export function backoffDelay(
  policy: RetryBackoffConfig,
  retry: number,
  random: () => number = Math.random,
): number {
  const exponent = Math.max(0, retry - 1);
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(policy.multiplier, exponent));
  return policy.jitter ? Math.floor(random() * ceiling) : ceiling;
}
