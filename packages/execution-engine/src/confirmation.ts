import {
  CONFIRMATION_RANK,
  errorMessage,
  type ConfirmationLevel,
  type ExecutionBackend,
  type Submission,
} from '@sluice/types';
import type { Clock } from './clock.js';
import { withDeadline } from './deadline.js';
import type { ConfirmationPolicy } from './types.js';

/** Where polling ended up */
export type PollOutcome =
  | { kind: 'confirmed'; level: ConfirmationLevel; landedCount?: number }
  | { kind: 'failed'; error: string }
  | { kind: 'dropped'; reason: string; landedCount?: number }
  /** Budget exhausted without a terminal signal */
  | { kind: 'unknown'; highestLevel: ConfirmationLevel; lastPollError?: string };

/**
 * Confirmation Poller
 *
 * Polls one backend for one submission, sequentially, until the target
 * commitment is reached, a terminal negative signal arrives, or the budget
 * runs out. Poll intervals grow geometrically up to a cap. The tracked level
 * only moves up the lattice: a lagging node reporting a lower level than one
 * already seen is ignored.
 */
export class ConfirmationPoller {
  constructor(
    private policy: ConfirmationPolicy,
    private clock: Clock,
  ) {}

  /**
   * Poll until settled. Only throws if `signal` aborts; a failing poll is
   * retried on the next tick.
   */
  async waitFor(
    backend: ExecutionBackend,
    submission: Submission,
    signal?: AbortSignal,
    onProgress?: (level: ConfirmationLevel) => void,
  ): Promise<PollOutcome> {
    const deadline = this.clock.now() + this.policy.maxWaitMs;
    const target = CONFIRMATION_RANK[this.policy.targetLevel];
    let interval = this.policy.initialIntervalMs;
    let highest: ConfirmationLevel = 'submitted';
    let landedCount: number | undefined;
    let lastPollError: string | undefined;

    for (;;) {
      try {
        const status = await withDeadline(this.policy.pollTimeoutMs, signal, (s) =>
          backend.confirm(submission, s),
        );
        lastPollError = undefined;

        switch (status.state) {
          case 'failed':
            return { kind: 'failed', error: status.error };
          case 'dropped':
            return { kind: 'dropped', reason: status.reason, landedCount: status.landedCount };
          case 'progress':
            if (CONFIRMATION_RANK[status.level] > CONFIRMATION_RANK[highest]) {
              highest = status.level;
              onProgress?.(highest);
            }
            if (status.landedCount !== undefined) {
              landedCount = Math.max(landedCount ?? 0, status.landedCount);
            }
            if (CONFIRMATION_RANK[highest] >= target) {
              return { kind: 'confirmed', level: highest, landedCount };
            }
            break;
          case 'not_found':
            // Not propagated yet; only the budget turns this into a verdict
            break;
        }
      } catch (err) {
        if (signal?.aborted) throw err;
        lastPollError = errorMessage(err);
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        return { kind: 'unknown', highestLevel: highest, lastPollError };
      }
      await this.clock.sleep(Math.min(interval, remaining), signal);
      interval = Math.min(interval * this.policy.backoffFactor, this.policy.maxIntervalMs);
    }
  }
}
