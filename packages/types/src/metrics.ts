// ============================================================================
// Metrics Types
// ============================================================================

/** Rolling windows the collector maintains */
export type MetricsWindowName = '1m' | '5m' | '1h' | '1d';

export const METRICS_WINDOWS: readonly MetricsWindowName[] = ['1m', '5m', '1h', '1d'];

/** Per-backend counters inside a bucket or window */
export interface BackendCounts {
  attempts: number;
  successes: number;
  failures: number;
  timeouts: number;
  unknowns: number;
}

/** Aggregated view of one window */
export interface WindowStats {
  window: MetricsWindowName;
  total: number;
  /** 0-1; 0 when there were no attempts */
  successRate: number;
  avgLatencyMs: number;
  p95LatencyMs: number;
  executionsPerMinute: number;
  countByBackend: Record<string, BackendCounts>;
}

/** Latency profile of one backend */
export interface BackendPerformance {
  backend: string;
  attempts: number;
  successRate: number;
  avgLatencyMs: number;
  medianLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
}

/** Serialized time bucket */
export interface BucketSnapshot {
  bucketStart: number;
  bucketMs: number;
  counts: Record<string, BackendCounts>;
  latencySumMs: number;
  latencyCount: number;
}

/** Serializable aggregate for persistence and reporting */
export interface MetricsSnapshot {
  generatedAt: number;
  /** Start of the current 1m window; persisted snapshots are keyed by it */
  windowStart: number;
  windows: Record<MetricsWindowName, WindowStats>;
  backends: BackendPerformance[];
  totals: BackendCounts;
  buckets: Record<MetricsWindowName, BucketSnapshot[]>;
}

/** One hour of the 1d window */
export interface HourlyTrend {
  hourStart: number;
  total: number;
  successes: number;
  failures: number;
  successRate: number;
  avgLatencyMs: number;
}
