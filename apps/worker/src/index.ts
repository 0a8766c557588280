/**
 * Sluice Worker: headless runtime for the execution engine.
 *
 * Configuration via environment variables (see config.ts), most importantly:
 *   BUILDER_URL      - transaction builder endpoint (required)
 *   DATABASE_URL     - PostgreSQL; in-memory stores when unset
 *   SOLANA_NETWORK   - mainnet-beta | devnet | localnet (default: devnet)
 *   SOLANA_RPC_URL   - custom RPC endpoint
 *   HELIUS_API_KEY   - Helius RPC key
 *   BACKENDS         - fallback order, e.g. "jito,rpc" (default: rpc)
 *   PORT             - HTTP API port (default: 8081)
 */

import type { Server } from 'node:http';
import { config as loadDotenv } from 'dotenv';
import type { AttemptStore, ExecutionBackend, MetricsSnapshotStore, OrderStore } from '@sluice/types';
import {
  MemoryAttemptStore,
  MemoryMetricsSnapshotStore,
  MemoryOrderStore,
  PgAttemptStore,
  PgMetricsSnapshotStore,
  PgOrderStore,
  createPgPool,
  migrate,
} from '@sluice/store';
import { OrderManager } from '@sluice/order-manager';
import { MetricsCollector } from '@sluice/metrics';
import {
  ExecutionEngine,
  JitoBundleBackend,
  SolanaRpcBackend,
  createConnection,
  getRpcDisplayUrl,
  type EngineEvent,
} from '@sluice/execution-engine';
import { loadConfig, type WorkerConfig } from './config.js';
import { HttpTransactionBuilder } from './http-builder.js';
import { createServer } from './server.js';
import { log } from './logger.js';

loadDotenv();

// ============================================================================
// Wiring
// ============================================================================

interface Stores {
  orders: OrderStore;
  attempts: AttemptStore;
  snapshots: MetricsSnapshotStore;
  close(): Promise<void>;
}

async function openStores(config: WorkerConfig): Promise<Stores> {
  if (!config.databaseUrl) {
    log('No DATABASE_URL set, using in-memory stores');
    const orders = new MemoryOrderStore();
    return {
      orders,
      attempts: new MemoryAttemptStore(),
      snapshots: new MemoryMetricsSnapshotStore(),
      close: () => orders.close(),
    };
  }

  const pool = createPgPool(config.databaseUrl);
  await migrate(pool);
  log('PostgreSQL schema ready');
  return {
    orders: new PgOrderStore(pool),
    attempts: new PgAttemptStore(pool),
    snapshots: new PgMetricsSnapshotStore(pool),
    close: () => pool.end(),
  };
}

function buildBackends(config: WorkerConfig): ExecutionBackend[] {
  const connection = createConnection(config.connection);
  log('Connected to Solana RPC', { url: getRpcDisplayUrl(config.connection) });

  return config.backends.map((name) =>
    name === 'jito'
      ? new JitoBundleBackend(connection, { endpoint: config.jitoEndpoint })
      : new SolanaRpcBackend(connection),
  );
}

function logEvent(event: EngineEvent): void {
  switch (event.type) {
    case 'circuit_state_changed':
      log(`Event: ${event.type}`, { backend: event.backend, from: event.from, to: event.to });
      return;
    case 'order_failed':
    case 'order_unknown':
    case 'order_retry_scheduled':
      log(`Event: ${event.type}`, { orderId: event.orderId, kind: event.error.kind, summary: event.summary });
      return;
    default:
      log(`Event: ${event.type}`, { orderId: event.orderId, summary: event.summary });
  }
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  log('Sluice worker starting...');

  const config = loadConfig();
  const stores = await openStores(config);
  const metrics = new MetricsCollector();
  const orders = new OrderManager(stores.orders, { defaultMaxRetries: config.engine.maxRetries });

  const engine = new ExecutionEngine(
    {
      orders,
      builder: new HttpTransactionBuilder(config.builderUrl, config.builderTimeoutMs),
      backends: buildBackends(config),
      metrics,
      attempts: stores.attempts,
    },
    config.engine,
  );
  engine.onEvent(logEvent);

  await engine.start();
  log('Engine started', {
    workers: config.engine.maxConcurrentExecutions,
    backends: config.backends.join(','),
  });

  const snapshotTimer = setInterval(() => {
    stores.snapshots.save(metrics.export()).catch((err: unknown) => {
      log('Metrics snapshot failed', { error: err instanceof Error ? err.message : String(err) });
    });
  }, config.metricsSnapshotIntervalMs);
  snapshotTimer.unref();

  const app = createServer({ engine, metrics });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(config.port, () => resolve(listening));
  });
  log(`Listening on port ${config.port}`);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log(`${signal} received, shutting down`);

    clearInterval(snapshotTimer);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await engine.stop();
    await stores.snapshots.save(metrics.export());
    await stores.close();
    log('Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
          process.exit(1);
        });
    });
  }
}

main().catch((err: unknown) => {
  log('Fatal error', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
