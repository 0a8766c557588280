import type { AttemptOutcome, BackendCounts } from '@sluice/types';

export function emptyCounts(): BackendCounts {
  return { attempts: 0, successes: 0, failures: 0, timeouts: 0, unknowns: 0 };
}

export function addOutcome(counts: BackendCounts, outcome: AttemptOutcome): void {
  counts.attempts++;
  switch (outcome) {
    case 'SUCCESS':
      counts.successes++;
      break;
    case 'FAILURE':
      counts.failures++;
      break;
    case 'TIMEOUT':
      counts.timeouts++;
      break;
    case 'UNKNOWN':
      counts.unknowns++;
      break;
  }
}

export function mergeCounts(into: BackendCounts, from: BackendCounts): void {
  into.attempts += from.attempts;
  into.successes += from.successes;
  into.failures += from.failures;
  into.timeouts += from.timeouts;
  into.unknowns += from.unknowns;
}

/** Per-backend slice of a bucket */
export interface BackendSlice {
  counts: BackendCounts;
  latencySumMs: number;
  latencyCount: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  /** Ring of recent latencies; `latencyCount` tells where the next one goes */
  samples: number[];
}

export class Bucket {
  readonly backends: Map<string, BackendSlice> = new Map();

  constructor(readonly start: number) {}

  add(backend: string, outcome: AttemptOutcome, latencyMs: number, maxSamples: number): void {
    let slice = this.backends.get(backend);
    if (!slice) {
      slice = {
        counts: emptyCounts(),
        latencySumMs: 0,
        latencyCount: 0,
        minLatencyMs: Number.POSITIVE_INFINITY,
        maxLatencyMs: 0,
        samples: [],
      };
      this.backends.set(backend, slice);
    }

    addOutcome(slice.counts, outcome);
    if (slice.samples.length < maxSamples) {
      slice.samples.push(latencyMs);
    } else {
      slice.samples[slice.latencyCount % maxSamples] = latencyMs;
    }
    slice.latencySumMs += latencyMs;
    slice.latencyCount++;
    slice.minLatencyMs = Math.min(slice.minLatencyMs, latencyMs);
    slice.maxLatencyMs = Math.max(slice.maxLatencyMs, latencyMs);
  }
}

/** Nearest-rank percentile of an ascending array; 0 when empty */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(sorted.length, Math.max(1, rank)) - 1];
}
