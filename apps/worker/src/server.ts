import express, { type ErrorRequestHandler, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import {
  IllegalTransitionError,
  METRICS_WINDOWS,
  NotFoundError,
  ValidationError,
  errorMessage,
  windowStatsSchema,
} from '@sluice/types';
import { validateIntent } from '@sluice/order-manager';
import type { ExecutionEngine } from '@sluice/execution-engine';
import type { MetricsCollector } from '@sluice/metrics';

export interface ServerDependencies {
  engine: ExecutionEngine;
  metrics: MetricsCollector;
}

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const metricsQuerySchema = z.object({
  window: windowStatsSchema.shape.window.optional(),
});

/**
 * HTTP surface of the worker.
 *
 * Errors come back as `{ error }` JSON: 400 for rejected input, 404 for an
 * unknown order, 409 for an illegal transition, 500 for everything else.
 */
export function createServer({ engine, metrics }: ServerDependencies): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // ==========================================================================
  // Health & Status
  // ==========================================================================

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', uptime: process.uptime(), timestamp: Date.now() });
  });

  app.get('/api/status', async (_req, res) => {
    try {
      res.json(await engine.getSystemStatus());
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/metrics', (req, res) => {
    const query = metricsQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: `window must be one of ${METRICS_WINDOWS.join(', ')}` });
      return;
    }

    const { window } = query.data;
    if (window) {
      res.json(metrics.query(window));
      return;
    }
    res.json({
      windows: METRICS_WINDOWS.map((name) => metrics.query(name)),
      backends: metrics.backendPerformance(),
      hourly: metrics.hourlyTrend(),
      totals: metrics.getTotals(),
    });
  });

  // ==========================================================================
  // Orders
  // ==========================================================================

  app.post('/api/orders', async (req, res) => {
    try {
      const intent = validateIntent(req.body);
      const orderId = await engine.submitTradingSignal(intent);
      res.status(202).json({ orderId });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/orders', async (req, res) => {
    const query = listQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ error: 'limit must be an integer between 1 and 500' });
      return;
    }
    try {
      res.json({ orders: await engine.listRecentOrders(query.data.limit) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get('/api/orders/:id', async (req, res) => {
    try {
      res.json(await engine.getOrderStatus(req.params.id));
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post('/api/orders/:id/cancel', async (req, res) => {
    try {
      res.json(await engine.cancel(req.params.id));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ==========================================================================
  // Engine Control
  // ==========================================================================

  app.post('/api/engine/pause', (_req, res) => {
    engine.pause();
    res.json({ paused: true });
  });

  app.post('/api/engine/resume', (_req, res) => {
    engine.resume();
    res.json({ paused: false });
  });

  app.use(jsonErrors);

  return app;
}

function sendError(res: Response, err: unknown): void {
  res.status(statusFor(err)).json({ error: errorMessage(err) });
}

function statusFor(err: unknown): number {
  if (err instanceof ValidationError) return 400;
  if (err instanceof NotFoundError) return 404;
  if (err instanceof IllegalTransitionError) return 409;
  return 500;
}

/** Body parser failures arrive here instead of the route handler */
const jsonErrors: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'Request body is not valid JSON' });
    return;
  }
  sendError(res, err);
};
