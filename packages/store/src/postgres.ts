import { readFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import pg from 'pg';
import type { Pool, QueryResultRow } from 'pg';
import { z } from 'zod';
import {
  attemptOutcomeSchema,
  errorKindSchema,
  errorMessage,
  executionErrorSchema,
  metricsSnapshotSchema,
  NotFoundError,
  orderStatusSchema,
  tradingIntentSchema,
  type AttemptStore,
  type ExecutionAttempt,
  type MetricsSnapshot,
  type MetricsSnapshotStore,
  type Order,
  type OrderStatus,
  type OrderStore,
} from '@sluice/types';

// ============================================================================
// Connection Surface
// ============================================================================

export interface PgQueryResult {
  rows: QueryResultRow[];
  rowCount: number | null;
}

export interface PgClientLike {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  release(): void;
}

/** The subset of `pg.Pool` the stores use */
export interface PgPoolLike {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
  connect(): Promise<PgClientLike>;
  end(): Promise<void>;
}

export function createPgPool(connectionString: string, max = 10): Pool {
  return new pg.Pool({ connectionString, max });
}

/** schema.sql at the package root, found the same way from src/ and from a build */
export function schemaPath(): string {
  return createRequire(import.meta.url).resolve('@sluice/store/schema.sql');
}

/** Apply schema.sql. Every statement is idempotent. */
export async function migrate(pool: PgPoolLike, path: string = schemaPath()): Promise<void> {
  const sql = await readFile(path, 'utf8');
  await pool.query(sql);
}

// ============================================================================
// Row Mapping
// ============================================================================

const orderRowSchema = z.object({
  id: z.string(),
  intent: tradingIntentSchema,
  status: orderStatusSchema,
  created_at: z.coerce.number(),
  updated_at: z.coerce.number(),
  attempt_count: z.coerce.number(),
  max_retries: z.coerce.number(),
  last_error: executionErrorSchema.nullable(),
  execution_method: z.string().nullable(),
  result_reference: z.string().nullable(),
  cancel_requested: z.boolean(),
});

const attemptRowSchema = z.object({
  order_id: z.string(),
  backend: z.string(),
  started_at: z.coerce.number(),
  ended_at: z.coerce.number(),
  outcome: attemptOutcomeSchema,
  error_kind: errorKindSchema.nullable(),
  latency_ms: z.coerce.number(),
});

const statusCountRowSchema = z.object({
  status: orderStatusSchema,
  count: z.coerce.number(),
});

export function rowToOrder(row: QueryResultRow): Order {
  const r = orderRowSchema.parse(row);
  return {
    id: r.id,
    intent: r.intent,
    status: r.status,
    createdAt: r.created_at,
    updatedAt: r.updated_at,
    attemptCount: r.attempt_count,
    maxRetries: r.max_retries,
    lastError: r.last_error ?? undefined,
    executionMethod: r.execution_method ?? undefined,
    resultReference: r.result_reference ?? undefined,
    cancelRequested: r.cancel_requested,
  };
}

function rowToAttempt(row: QueryResultRow): ExecutionAttempt {
  const r = attemptRowSchema.parse(row);
  return {
    orderId: r.order_id,
    backend: r.backend,
    startedAt: r.started_at,
    endedAt: r.ended_at,
    outcome: r.outcome,
    errorKind: r.error_kind ?? undefined,
    latencyMs: r.latency_ms,
  };
}

const ORDER_COLUMNS =
  'id, client_order_id, intent, status, created_at, updated_at, attempt_count, max_retries, ' +
  'last_error, execution_method, result_reference, cancel_requested';

// ============================================================================
// Stores
// ============================================================================

/**
 * PostgreSQL order store. `update` runs one row under
 * BEGIN / SELECT ... FOR UPDATE / UPDATE / COMMIT.
 */
export class PgOrderStore implements OrderStore {
  constructor(private pool: PgPoolLike) {}

  async insert(order: Order): Promise<void> {
    await this.pool.query(
      `INSERT INTO orders (${ORDER_COLUMNS})
       VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7, $8, $9::jsonb, $10, $11, $12)`,
      [
        order.id,
        order.intent.clientOrderId ?? null,
        JSON.stringify(order.intent),
        order.status,
        order.createdAt,
        order.updatedAt,
        order.attemptCount,
        order.maxRetries,
        order.lastError ? JSON.stringify(order.lastError) : null,
        order.executionMethod ?? null,
        order.resultReference ?? null,
        order.cancelRequested,
      ],
    );
  }

  async get(id: string): Promise<Order | null> {
    const result = await this.pool.query(`SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`, [id]);
    const row = result.rows[0];
    return row ? rowToOrder(row) : null;
  }

  async findByClientOrderId(clientOrderId: string): Promise<Order | null> {
    const result = await this.pool.query(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE client_order_id = $1`,
      [clientOrderId],
    );
    const row = result.rows[0];
    return row ? rowToOrder(row) : null;
  }

  async update(id: string, mutate: (current: Order) => Order): Promise<Order> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await client.query(
        `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1 FOR UPDATE`,
        [id],
      );
      const row = result.rows[0];
      if (!row) {
        throw new NotFoundError(id);
      }

      const next = mutate(rowToOrder(row));
      await client.query(
        `UPDATE orders
         SET status = $2, updated_at = $3, attempt_count = $4, last_error = $5::jsonb,
             execution_method = $6, result_reference = $7, cancel_requested = $8
         WHERE id = $1`,
        [
          id,
          next.status,
          next.updatedAt,
          next.attemptCount,
          next.lastError ? JSON.stringify(next.lastError) : null,
          next.executionMethod ?? null,
          next.resultReference ?? null,
          next.cancelRequested,
        ],
      );
      await client.query('COMMIT');
      return next;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        console.error(`[store] Rollback of order ${id} failed: ${errorMessage(rollbackErr)}`);
      }
      throw err;
    } finally {
      client.release();
    }
  }

  async listByStatus(statuses: readonly OrderStatus[]): Promise<Order[]> {
    const result = await this.pool.query(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE status = ANY($1) ORDER BY created_at ASC`,
      [[...statuses]],
    );
    return result.rows.map(rowToOrder);
  }

  async listRecent(limit: number): Promise<Order[]> {
    const result = await this.pool.query(
      `SELECT ${ORDER_COLUMNS} FROM orders ORDER BY created_at DESC LIMIT $1`,
      [Math.max(0, limit)],
    );
    return result.rows.map(rowToOrder);
  }

  async countByStatus(): Promise<Partial<Record<OrderStatus, number>>> {
    const result = await this.pool.query(
      'SELECT status, COUNT(*)::int AS count FROM orders GROUP BY status',
    );
    const counts: Partial<Record<OrderStatus, number>> = {};
    for (const row of result.rows) {
      const { status, count } = statusCountRowSchema.parse(row);
      counts[status] = count;
    }
    return counts;
  }

  async deleteUpdatedBefore(statuses: readonly OrderStatus[], cutoff: number): Promise<number> {
    const result = await this.pool.query(
      'DELETE FROM orders WHERE status = ANY($1) AND updated_at < $2',
      [[...statuses], cutoff],
    );
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export class PgAttemptStore implements AttemptStore {
  constructor(private pool: PgPoolLike) {}

  async append(attempt: ExecutionAttempt): Promise<void> {
    await this.pool.query(
      `INSERT INTO execution_attempts
         (order_id, backend, started_at, ended_at, outcome, error_kind, latency_ms)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        attempt.orderId,
        attempt.backend,
        attempt.startedAt,
        attempt.endedAt,
        attempt.outcome,
        attempt.errorKind ?? null,
        Math.round(attempt.latencyMs),
      ],
    );
  }

  async listByOrder(orderId: string): Promise<ExecutionAttempt[]> {
    const result = await this.pool.query(
      `SELECT order_id, backend, started_at, ended_at, outcome, error_kind, latency_ms
       FROM execution_attempts WHERE order_id = $1 ORDER BY id ASC`,
      [orderId],
    );
    return result.rows.map(rowToAttempt);
  }

  async deleteBefore(cutoff: number): Promise<number> {
    const result = await this.pool.query('DELETE FROM execution_attempts WHERE started_at < $1', [
      cutoff,
    ]);
    return result.rowCount ?? 0;
  }
}

export class PgMetricsSnapshotStore implements MetricsSnapshotStore {
  constructor(private pool: PgPoolLike) {}

  async save(snapshot: MetricsSnapshot): Promise<void> {
    await this.pool.query(
      `INSERT INTO metrics_snapshots (window_start, generated_at, snapshot)
       VALUES ($1, $2, $3::jsonb)
       ON CONFLICT (window_start)
       DO UPDATE SET generated_at = EXCLUDED.generated_at, snapshot = EXCLUDED.snapshot`,
      [snapshot.windowStart, snapshot.generatedAt, JSON.stringify(snapshot)],
    );
  }

  async latest(): Promise<MetricsSnapshot | null> {
    const result = await this.pool.query(
      'SELECT snapshot FROM metrics_snapshots ORDER BY window_start DESC LIMIT 1',
    );
    const row = result.rows[0];
    return row ? metricsSnapshotSchema.parse(row.snapshot) : null;
  }
}
