/**
 * @sluice/metrics - Rolling-window execution metrics
 */

export { MetricsCollector } from './collector.js';
export { percentile } from './bucket.js';
export { DEFAULT_METRICS_CONFIG } from './types.js';
export type { MetricsConfig, WindowLayout } from './types.js';
