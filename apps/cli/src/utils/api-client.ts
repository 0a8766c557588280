import { z } from 'zod';
import {
  attemptOutcomeSchema,
  backendCountsSchema,
  backendPerformanceSchema,
  errorKindSchema,
  executionErrorSchema,
  orderStatusSchema,
  tradingIntentSchema,
  windowStatsSchema,
  type MetricsWindowName,
  type TradingIntent,
} from '@sluice/types';

// ============================================================================
// Response Schemas
// ============================================================================

const orderSchema = z.object({
  id: z.string(),
  intent: tradingIntentSchema,
  status: orderStatusSchema,
  createdAt: z.number(),
  updatedAt: z.number(),
  attemptCount: z.number(),
  maxRetries: z.number(),
  lastError: executionErrorSchema.optional(),
  executionMethod: z.string().optional(),
  resultReference: z.string().optional(),
  cancelRequested: z.boolean(),
});

const attemptSchema = z.object({
  orderId: z.string(),
  backend: z.string(),
  startedAt: z.number(),
  endedAt: z.number(),
  outcome: attemptOutcomeSchema,
  errorKind: errorKindSchema.optional(),
  latencyMs: z.number(),
});

const orderViewSchema = orderSchema.extend({ attempts: z.array(attemptSchema) });

const systemStatusSchema = z.object({
  running: z.boolean(),
  paused: z.boolean(),
  queueDepth: z.number(),
  backlogDepth: z.number(),
  activeCount: z.number(),
  pendingRetries: z.number(),
  circuits: z.array(
    z.object({
      backend: z.string(),
      consecutiveFailures: z.number(),
      state: z.enum(['CLOSED', 'OPEN', 'HALF_OPEN']),
      openedAt: z.number().optional(),
      resetTimeoutMs: z.number(),
    }),
  ),
  metrics: windowStatsSchema,
  orders: z.object({
    total: z.number(),
    byStatus: z.record(z.string(), z.number()),
    active: z.number(),
    successRate: z.number(),
  }),
});

const metricsReportSchema = z.object({
  windows: z.array(windowStatsSchema),
  backends: z.array(backendPerformanceSchema),
  hourly: z.array(
    z.object({
      hourStart: z.number(),
      total: z.number(),
      successes: z.number(),
      failures: z.number(),
      successRate: z.number(),
      avgLatencyMs: z.number(),
    }),
  ),
  totals: backendCountsSchema,
});

const errorBodySchema = z.object({ error: z.string() });

export type OrderRecord = z.infer<typeof orderSchema>;
export type OrderView = z.infer<typeof orderViewSchema>;
export type SystemStatusReport = z.infer<typeof systemStatusSchema>;
export type MetricsReport = z.infer<typeof metricsReportSchema>;
export type WindowReport = z.infer<typeof windowStatsSchema>;

/** Non-2xx answer from the worker */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Thin client for the worker's HTTP API.
 * Every response is validated before it reaches a command.
 */
export class SluiceApiClient {
  private baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async submit(intent: TradingIntent): Promise<string> {
    const body = await this.request('POST', '/api/orders', z.object({ orderId: z.string() }), intent);
    return body.orderId;
  }

  getOrder(orderId: string): Promise<OrderView> {
    return this.request('GET', `/api/orders/${encodeURIComponent(orderId)}`, orderViewSchema);
  }

  async listOrders(limit: number): Promise<OrderRecord[]> {
    const body = await this.request('GET', `/api/orders?limit=${limit}`, z.object({ orders: z.array(orderSchema) }));
    return body.orders;
  }

  cancel(orderId: string): Promise<{ accepted: boolean; note: string }> {
    return this.request(
      'POST',
      `/api/orders/${encodeURIComponent(orderId)}/cancel`,
      z.object({ accepted: z.boolean(), note: z.string() }),
    );
  }

  getStatus(): Promise<SystemStatusReport> {
    return this.request('GET', '/api/status', systemStatusSchema);
  }

  getMetrics(): Promise<MetricsReport> {
    return this.request('GET', '/api/metrics', metricsReportSchema);
  }

  getWindow(window: MetricsWindowName): Promise<WindowReport> {
    return this.request('GET', `/api/metrics?window=${window}`, windowStatsSchema);
  }

  async setPaused(paused: boolean): Promise<boolean> {
    const body = await this.request(
      'POST',
      paused ? '/api/engine/pause' : '/api/engine/resume',
      z.object({ paused: z.boolean() }),
    );
    return body.paused;
  }

  // ---- Private ----

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload?: unknown,
  ): Promise<T> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      });
    } catch (err) {
      throw new Error(`Cannot reach ${this.baseUrl}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const body: unknown = await response.json().catch(() => undefined);
    if (!response.ok) {
      const parsed = errorBodySchema.safeParse(body);
      throw new ApiError(response.status, parsed.success ? parsed.data.error : `HTTP ${response.status}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`Unexpected response from ${method} ${path}`);
    }
    return parsed.data;
  }
}
