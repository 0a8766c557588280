import type { CircuitBreakerState, CircuitState } from '@sluice/types';

export interface CircuitBreakerConfig {
  /** Consecutive failures that open the circuit */
  threshold: number;
  /** Time an open circuit waits before letting one trial through */
  resetTimeoutMs: number;
}

export interface CircuitStateChange {
  backend: string;
  from: CircuitState;
  to: CircuitState;
  consecutiveFailures: number;
}

export type CircuitStateChangeHandler = (change: CircuitStateChange) => void;

interface Breaker {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  /** HALF_OPEN admits exactly one dispatch until it reports back */
  trialInFlight: boolean;
}

/**
 * Circuit Breaker Registry
 *
 * Single owner of every backend's breaker. All methods are synchronous, so
 * each read-modify-write is atomic on the event loop no matter how many
 * workers share the registry.
 *
 * CLOSED --threshold failures--> OPEN --resetTimeout--> HALF_OPEN
 * HALF_OPEN --trial success--> CLOSED, --trial failure--> OPEN
 */
export class CircuitBreakerRegistry {
  private breakers: Map<string, Breaker> = new Map();
  private handlers: CircuitStateChangeHandler[] = [];

  constructor(
    private config: CircuitBreakerConfig,
    private now: () => number = Date.now,
  ) {
    if (config.threshold < 1) {
      throw new Error(`Circuit breaker threshold must be at least 1, got ${config.threshold}`);
    }
  }

  /**
   * Ask to dispatch to `backend`. A true answer must be followed by exactly
   * one of recordSuccess, recordFailure or release.
   */
  tryAcquire(backend: string): boolean {
    const breaker = this.breaker(backend);

    switch (breaker.state) {
      case 'CLOSED':
        return true;
      case 'OPEN': {
        const openedAt = breaker.openedAt ?? 0;
        if (this.now() - openedAt < this.config.resetTimeoutMs) {
          return false;
        }
        this.enter(backend, breaker, 'HALF_OPEN');
        breaker.trialInFlight = true;
        return true;
      }
      case 'HALF_OPEN':
        if (breaker.trialInFlight) return false;
        breaker.trialInFlight = true;
        return true;
    }
  }

  recordSuccess(backend: string): void {
    const breaker = this.breaker(backend);
    breaker.trialInFlight = false;
    if (breaker.state === 'CLOSED') {
      breaker.consecutiveFailures = 0;
    } else {
      this.enter(backend, breaker, 'CLOSED');
    }
  }

  recordFailure(backend: string): void {
    const breaker = this.breaker(backend);
    breaker.trialInFlight = false;

    if (breaker.state === 'HALF_OPEN') {
      this.enter(backend, breaker, 'OPEN');
      return;
    }
    if (breaker.state === 'CLOSED') {
      breaker.consecutiveFailures++;
      if (breaker.consecutiveFailures >= this.config.threshold) {
        console.error(
          `[circuit-breaker] ${backend} TRIPPED after ${breaker.consecutiveFailures} consecutive failures`,
        );
        this.enter(backend, breaker, 'OPEN');
      }
    }
  }

  /** End a dispatch that says nothing about backend health */
  release(backend: string): void {
    this.breaker(backend).trialInFlight = false;
  }

  getState(backend: string): CircuitBreakerState {
    const breaker = this.breaker(backend);
    return {
      backend,
      consecutiveFailures: breaker.consecutiveFailures,
      state: breaker.state,
      openedAt: breaker.openedAt,
      resetTimeoutMs: this.config.resetTimeoutMs,
    };
  }

  getAll(): CircuitBreakerState[] {
    return [...this.breakers.keys()].map((backend) => this.getState(backend));
  }

  /** Force a backend's circuit closed (operator override) */
  reset(backend: string): void {
    const breaker = this.breaker(backend);
    breaker.trialInFlight = false;
    if (breaker.state !== 'CLOSED') {
      this.enter(backend, breaker, 'CLOSED');
    } else {
      breaker.consecutiveFailures = 0;
    }
  }

  onStateChange(handler: CircuitStateChangeHandler): void {
    this.handlers.push(handler);
  }

  // ---- Private ----

  private breaker(backend: string): Breaker {
    let breaker = this.breakers.get(backend);
    if (!breaker) {
      breaker = { state: 'CLOSED', consecutiveFailures: 0, trialInFlight: false };
      this.breakers.set(backend, breaker);
    }
    return breaker;
  }

  private enter(backend: string, breaker: Breaker, to: CircuitState): void {
    const from = breaker.state;
    const failures = breaker.consecutiveFailures;
    breaker.state = to;
    breaker.consecutiveFailures = 0;
    breaker.openedAt = to === 'OPEN' ? this.now() : breaker.openedAt;
    if (to === 'CLOSED') breaker.openedAt = undefined;

    for (const handler of this.handlers) {
      try {
        handler({ backend, from, to, consecutiveFailures: failures });
      } catch (err) {
        console.warn('[circuit-breaker] State change handler error:', err);
      }
    }
  }
}
