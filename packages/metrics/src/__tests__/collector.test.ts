import { describe, it, expect, beforeEach } from 'vitest';
import type { AttemptOutcome, ExecutionAttempt } from '@sluice/types';
import { MetricsCollector } from '../collector.js';
import { percentile } from '../bucket.js';

function attempt(
  backend: string,
  outcome: AttemptOutcome,
  latencyMs: number,
  endedAt: number,
): ExecutionAttempt {
  return {
    orderId: 'order-1',
    backend,
    startedAt: endedAt - latencyMs,
    endedAt,
    outcome,
    errorKind: outcome === 'SUCCESS' ? undefined : 'TransientNetworkError',
    latencyMs,
  };
}

describe('MetricsCollector', () => {
  let now: number;
  let metrics: MetricsCollector;

  beforeEach(() => {
    now = 100_000;
    metrics = new MetricsCollector({}, () => now);
  });

  it('reports zeros before anything is recorded', () => {
    expect(metrics.query('1m')).toEqual({
      window: '1m',
      total: 0,
      successRate: 0,
      avgLatencyMs: 0,
      p95LatencyMs: 0,
      executionsPerMinute: 0,
      countByBackend: {},
    });
  });

  it('aggregates success rate, latency and per-backend counts', () => {
    metrics.record(attempt('jito', 'SUCCESS', 100, now));
    metrics.record(attempt('jito', 'FAILURE', 300, now));
    metrics.record(attempt('rpc', 'SUCCESS', 200, now));

    const stats = metrics.query('1m');
    expect(stats.total).toBe(3);
    expect(stats.successRate).toBeCloseTo(2 / 3);
    expect(stats.avgLatencyMs).toBe(200);
    expect(stats.p95LatencyMs).toBe(300);
    expect(stats.executionsPerMinute).toBe(3);
    expect(stats.countByBackend.jito).toEqual({
      attempts: 2,
      successes: 1,
      failures: 1,
      timeouts: 0,
      unknowns: 0,
    });

    expect(metrics.query('5m').executionsPerMinute).toBeCloseTo(0.6);
  });

  it('expires buckets that fall out of the window', () => {
    metrics.record(attempt('rpc', 'SUCCESS', 50, now));

    now = 159_999;
    expect(metrics.query('1m').total).toBe(1);

    now = 161_000;
    expect(metrics.query('1m').total).toBe(0);
    expect(metrics.query('5m').total).toBe(1);
  });

  it('keeps buckets ordered when an attempt arrives late', () => {
    metrics.record(attempt('rpc', 'SUCCESS', 10, 100_000));
    metrics.record(attempt('rpc', 'TIMEOUT', 10, 95_000));

    const snapshot = metrics.export();
    expect(snapshot.buckets['1m'].map((b) => b.bucketStart)).toEqual([90_000, 100_000]);
    expect(snapshot.buckets['5m']).toHaveLength(1);
    expect(snapshot.buckets['5m'][0].counts.rpc.timeouts).toBe(1);
  });

  it('counts attempts older than a window only in wider windows and totals', () => {
    metrics.record(attempt('rpc', 'UNKNOWN', 10, 0));

    expect(metrics.query('1m').total).toBe(0);
    expect(metrics.query('5m').total).toBe(1);
    expect(metrics.getTotals()).toEqual({
      attempts: 1,
      successes: 0,
      failures: 0,
      timeouts: 0,
      unknowns: 1,
    });
  });

  it('profiles each backend', () => {
    metrics.record(attempt('jito', 'SUCCESS', 100, now));
    metrics.record(attempt('jito', 'FAILURE', 300, now));
    metrics.record(attempt('jito', 'SUCCESS', 200, now));
    metrics.record(attempt('rpc', 'SUCCESS', 50, now));

    expect(metrics.backendPerformance()).toEqual([
      {
        backend: 'jito',
        attempts: 3,
        successRate: 2 / 3,
        avgLatencyMs: 200,
        medianLatencyMs: 200,
        minLatencyMs: 100,
        maxLatencyMs: 300,
      },
      {
        backend: 'rpc',
        attempts: 1,
        successRate: 1,
        avgLatencyMs: 50,
        medianLatencyMs: 50,
        minLatencyMs: 50,
        maxLatencyMs: 50,
      },
    ]);
  });

  it('summarises the day hour by hour', () => {
    now = 7_200_000;
    metrics.record(attempt('jito', 'SUCCESS', 100, 3_700_000));
    metrics.record(attempt('jito', 'FAILURE', 300, 7_200_000));

    expect(metrics.hourlyTrend()).toEqual([
      { hourStart: 3_600_000, total: 1, successes: 1, failures: 0, successRate: 1, avgLatencyMs: 100 },
      { hourStart: 7_200_000, total: 1, successes: 0, failures: 1, successRate: 0, avgLatencyMs: 300 },
    ]);
  });

  it('bounds latency samples per bucket without losing the average', () => {
    metrics = new MetricsCollector({ maxSamplesPerBucket: 2 }, () => now);
    metrics.record(attempt('rpc', 'SUCCESS', 10, now));
    metrics.record(attempt('rpc', 'SUCCESS', 20, now));
    metrics.record(attempt('rpc', 'SUCCESS', 30, now));

    const stats = metrics.query('1m');
    expect(stats.avgLatencyMs).toBe(20);
    expect(stats.p95LatencyMs).toBe(30);
  });

  it('exports a snapshot keyed by the current minute', () => {
    now = 125_000;
    metrics.record(attempt('rpc', 'SUCCESS', 40, now));

    const snapshot = metrics.export();
    expect(snapshot.generatedAt).toBe(125_000);
    expect(snapshot.windowStart).toBe(120_000);
    expect(snapshot.windows['1h'].window).toBe('1h');
    expect(snapshot.windows['1d'].total).toBe(1);
    expect(snapshot.totals.successes).toBe(1);
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual(snapshot);
  });
});

describe('percentile', () => {
  it('uses nearest rank', () => {
    expect(percentile([], 95)).toBe(0);
    expect(percentile([5], 50)).toBe(5);
    expect(percentile(Array.from({ length: 100 }, (_, i) => i + 1), 95)).toBe(95);
  });
});
