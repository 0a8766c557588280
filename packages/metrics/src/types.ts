import type { MetricsWindowName } from '@sluice/types';

/** Bucket layout of one rolling window */
export interface WindowLayout {
  bucketMs: number;
  bucketCount: number;
}

export interface MetricsConfig {
  windows: Record<MetricsWindowName, WindowLayout>;
  /** Latency samples kept per backend per bucket, for percentiles */
  maxSamplesPerBucket: number;
}

export const DEFAULT_METRICS_CONFIG: MetricsConfig = {
  windows: {
    '1m': { bucketMs: 10_000, bucketCount: 6 },
    '5m': { bucketMs: 30_000, bucketCount: 10 },
    '1h': { bucketMs: 300_000, bucketCount: 12 },
    '1d': { bucketMs: 3_600_000, bucketCount: 24 },
  },
  maxSamplesPerBucket: 256,
};
