/**
 * @sluice/store - Order, attempt and metrics snapshot persistence
 *
 * Memory implementations for tests and single-process runs, PostgreSQL
 * implementations for durable deployments.
 */

export { MemoryOrderStore, MemoryAttemptStore, MemoryMetricsSnapshotStore } from './memory.js';
export {
  PgOrderStore,
  PgAttemptStore,
  PgMetricsSnapshotStore,
  createPgPool,
  migrate,
  rowToOrder,
} from './postgres.js';
export type { PgPoolLike, PgClientLike, PgQueryResult } from './postgres.js';
