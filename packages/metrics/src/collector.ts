import {
  METRICS_WINDOWS,
  type BackendCounts,
  type BackendPerformance,
  type BucketSnapshot,
  type ExecutionAttempt,
  type HourlyTrend,
  type MetricsSnapshot,
  type MetricsWindowName,
  type WindowStats,
} from '@sluice/types';
import { addOutcome, Bucket, emptyCounts, mergeCounts, percentile } from './bucket.js';
import { DEFAULT_METRICS_CONFIG, type MetricsConfig, type WindowLayout } from './types.js';

const MINUTE_MS = 60_000;

function windowMs(layout: WindowLayout): number {
  return layout.bucketMs * layout.bucketCount;
}

/**
 * Metrics Collector
 *
 * Keeps execution attempts in time buckets for each rolling window
 * (1m, 5m, 1h, 1d). Recording touches only the newest bucket of each
 * window; expired buckets are dropped on the next write. All methods are
 * synchronous, so concurrent workers never interleave inside an update.
 */
export class MetricsCollector {
  private config: MetricsConfig;
  private buckets: Record<MetricsWindowName, Bucket[]> = { '1m': [], '5m': [], '1h': [], '1d': [] };
  private totals: BackendCounts = emptyCounts();

  constructor(
    config: Partial<MetricsConfig> = {},
    private now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_METRICS_CONFIG, ...config };
  }

  record(attempt: ExecutionAttempt): void {
    const now = this.now();
    addOutcome(this.totals, attempt.outcome);

    for (const name of METRICS_WINDOWS) {
      const layout = this.config.windows[name];
      const buckets = this.buckets[name];
      const horizon = now - windowMs(layout);

      while (buckets.length > 0 && buckets[0].start <= horizon) {
        buckets.shift();
      }

      const start = Math.floor(attempt.endedAt / layout.bucketMs) * layout.bucketMs;
      if (start <= horizon) continue;

      this.bucketAt(buckets, start).add(
        attempt.backend,
        attempt.outcome,
        attempt.latencyMs,
        this.config.maxSamplesPerBucket,
      );
    }
  }

  query(window: MetricsWindowName): WindowStats {
    const layout = this.config.windows[window];
    const countByBackend: Record<string, BackendCounts> = {};
    const samples: number[] = [];
    let latencySum = 0;
    let latencyCount = 0;

    for (const bucket of this.live(window)) {
      for (const [backend, slice] of bucket.backends) {
        const counts = (countByBackend[backend] ??= emptyCounts());
        mergeCounts(counts, slice.counts);
        latencySum += slice.latencySumMs;
        latencyCount += slice.latencyCount;
        samples.push(...slice.samples);
      }
    }

    const totals = emptyCounts();
    for (const counts of Object.values(countByBackend)) {
      mergeCounts(totals, counts);
    }

    return {
      window,
      total: totals.attempts,
      successRate: totals.attempts > 0 ? totals.successes / totals.attempts : 0,
      avgLatencyMs: latencyCount > 0 ? latencySum / latencyCount : 0,
      p95LatencyMs: percentile(samples.sort((a, b) => a - b), 95),
      executionsPerMinute: totals.attempts / (windowMs(layout) / MINUTE_MS),
      countByBackend,
    };
  }

  /** Per-backend latency profile over the 1d window, sorted by backend name */
  backendPerformance(): BackendPerformance[] {
    const byBackend = new Map<
      string,
      { counts: BackendCounts; sum: number; count: number; min: number; max: number; samples: number[] }
    >();

    for (const bucket of this.live('1d')) {
      for (const [backend, slice] of bucket.backends) {
        let acc = byBackend.get(backend);
        if (!acc) {
          acc = {
            counts: emptyCounts(),
            sum: 0,
            count: 0,
            min: Number.POSITIVE_INFINITY,
            max: 0,
            samples: [],
          };
          byBackend.set(backend, acc);
        }
        mergeCounts(acc.counts, slice.counts);
        acc.sum += slice.latencySumMs;
        acc.count += slice.latencyCount;
        acc.min = Math.min(acc.min, slice.minLatencyMs);
        acc.max = Math.max(acc.max, slice.maxLatencyMs);
        acc.samples.push(...slice.samples);
      }
    }

    return [...byBackend.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([backend, acc]) => ({
        backend,
        attempts: acc.counts.attempts,
        successRate: acc.counts.attempts > 0 ? acc.counts.successes / acc.counts.attempts : 0,
        avgLatencyMs: acc.count > 0 ? acc.sum / acc.count : 0,
        medianLatencyMs: percentile(acc.samples.sort((x, y) => x - y), 50),
        minLatencyMs: acc.count > 0 ? acc.min : 0,
        maxLatencyMs: acc.max,
      }));
  }

  /** One row per hour bucket of the 1d window, oldest first */
  hourlyTrend(): HourlyTrend[] {
    return this.live('1d').map((bucket) => {
      const counts = emptyCounts();
      let sum = 0;
      let count = 0;
      for (const slice of bucket.backends.values()) {
        mergeCounts(counts, slice.counts);
        sum += slice.latencySumMs;
        count += slice.latencyCount;
      }
      return {
        hourStart: bucket.start,
        total: counts.attempts,
        successes: counts.successes,
        failures: counts.attempts - counts.successes,
        successRate: counts.attempts > 0 ? counts.successes / counts.attempts : 0,
        avgLatencyMs: count > 0 ? sum / count : 0,
      };
    });
  }

  /** Counts since the collector was created */
  getTotals(): BackendCounts {
    return { ...this.totals };
  }

  export(): MetricsSnapshot {
    const now = this.now();
    return {
      generatedAt: now,
      windowStart: Math.floor(now / MINUTE_MS) * MINUTE_MS,
      windows: {
        '1m': this.query('1m'),
        '5m': this.query('5m'),
        '1h': this.query('1h'),
        '1d': this.query('1d'),
      },
      backends: this.backendPerformance(),
      totals: this.getTotals(),
      buckets: {
        '1m': this.bucketSnapshots('1m'),
        '5m': this.bucketSnapshots('5m'),
        '1h': this.bucketSnapshots('1h'),
        '1d': this.bucketSnapshots('1d'),
      },
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /** Buckets still inside the window at read time */
  private live(window: MetricsWindowName): Bucket[] {
    const horizon = this.now() - windowMs(this.config.windows[window]);
    return this.buckets[window].filter((b) => b.start > horizon);
  }

  private bucketAt(buckets: Bucket[], start: number): Bucket {
    const last = buckets[buckets.length - 1];
    if (last && last.start === start) return last;
    if (!last || last.start < start) {
      const bucket = new Bucket(start);
      buckets.push(bucket);
      return bucket;
    }

    // Late arrival: keep buckets ordered by start
    let i = buckets.length - 1;
    while (i >= 0 && buckets[i].start > start) i--;
    if (i >= 0 && buckets[i].start === start) return buckets[i];
    const bucket = new Bucket(start);
    buckets.splice(i + 1, 0, bucket);
    return bucket;
  }

  private bucketSnapshots(window: MetricsWindowName): BucketSnapshot[] {
    const { bucketMs } = this.config.windows[window];
    return this.live(window).map((bucket) => {
      const counts: Record<string, BackendCounts> = {};
      let latencySumMs = 0;
      let latencyCount = 0;
      for (const [backend, slice] of bucket.backends) {
        counts[backend] = { ...slice.counts };
        latencySumMs += slice.latencySumMs;
        latencyCount += slice.latencyCount;
      }
      return { bucketStart: bucket.start, bucketMs, counts, latencySumMs, latencyCount };
    });
  }
}
