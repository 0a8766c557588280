import { setTimeout as delay } from 'node:timers/promises';

/** Time source for backoff and polling */
export interface Clock {
  now(): number;
  /** Resolves after `ms`; rejects if `signal` aborts first */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    await delay(ms, undefined, { signal });
  }
}

/**
 * Deterministic clock for tests. `sleep` advances time instantly and
 * records the requested duration.
 */
export class VirtualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.sleeps.push(ms);
    this.current += ms;
  }
}
