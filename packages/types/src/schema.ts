import { z } from 'zod';

// ============================================================================
// Runtime Schemas
// ============================================================================

export const orderStatusSchema = z.enum([
  'PENDING',
  'QUEUED',
  'EXECUTING',
  'SUBMITTED',
  'CONFIRMED',
  'FAILED',
  'TIMED_OUT',
  'CANCELLED',
  'UNKNOWN',
]);

/** Wire/DB shape of a trading intent. Also the submission validator. */
export const tradingIntentSchema = z.object({
  action: z.enum(['BUY', 'SELL'], {
    errorMap: () => ({ message: 'action must be BUY or SELL' }),
  }),
  market: z.string().trim().min(1, 'market must be a non-empty string'),
  size: z
    .number({ invalid_type_error: 'size must be a number' })
    .finite('size must be finite')
    .positive('size must be positive'),
  price: z.number().finite().positive('price must be positive').optional(),
  confidence: z
    .number({ invalid_type_error: 'confidence must be a number' })
    .min(0, 'confidence must be between 0 and 1')
    .max(1, 'confidence must be between 0 and 1'),
  clientOrderId: z.string().min(1).max(128).optional(),
});

export const executionErrorSchema = z.object({
  kind: z.enum([
    'ValidationError',
    'TransientNetworkError',
    'FatalSubmissionError',
    'CircuitOpenError',
    'UnknownOutcomeError',
    'interrupted',
  ]),
  message: z.string(),
});

export const attemptOutcomeSchema = z.enum(['SUCCESS', 'FAILURE', 'TIMEOUT', 'UNKNOWN']);

export const errorKindSchema = z.enum([
  'ValidationError',
  'TransientNetworkError',
  'FatalSubmissionError',
  'CircuitOpenError',
  'UnknownOutcomeError',
]);

// ============================================================================
// Metrics Snapshot
// ============================================================================

export const backendCountsSchema = z.object({
  attempts: z.number(),
  successes: z.number(),
  failures: z.number(),
  timeouts: z.number(),
  unknowns: z.number(),
});

export const windowStatsSchema = z.object({
  window: z.enum(['1m', '5m', '1h', '1d']),
  total: z.number(),
  successRate: z.number(),
  avgLatencyMs: z.number(),
  p95LatencyMs: z.number(),
  executionsPerMinute: z.number(),
  countByBackend: z.record(z.string(), backendCountsSchema),
});

export const backendPerformanceSchema = z.object({
  backend: z.string(),
  attempts: z.number(),
  successRate: z.number(),
  avgLatencyMs: z.number(),
  medianLatencyMs: z.number(),
  minLatencyMs: z.number(),
  maxLatencyMs: z.number(),
});

const bucketSnapshotSchema = z.object({
  bucketStart: z.number(),
  bucketMs: z.number(),
  counts: z.record(z.string(), backendCountsSchema),
  latencySumMs: z.number(),
  latencyCount: z.number(),
});

/** Validates snapshots read back from storage */
export const metricsSnapshotSchema = z.object({
  generatedAt: z.number(),
  windowStart: z.number(),
  windows: z.object({
    '1m': windowStatsSchema,
    '5m': windowStatsSchema,
    '1h': windowStatsSchema,
    '1d': windowStatsSchema,
  }),
  backends: z.array(backendPerformanceSchema),
  totals: backendCountsSchema,
  buckets: z.object({
    '1m': z.array(bucketSnapshotSchema),
    '5m': z.array(bucketSnapshotSchema),
    '1h': z.array(bucketSnapshotSchema),
    '1d': z.array(bucketSnapshotSchema),
  }),
});
