import chalk from 'chalk';
import Table from 'cli-table3';
import type { OrderStatus } from '@sluice/types';
import type { MetricsReport, OrderRecord, OrderView, SystemStatusReport, WindowReport } from './api-client.js';

const BRAND = {
  primary: chalk.hex('#0ea5e9'),   // Sky
  secondary: chalk.hex('#38bdf8'), // Light sky
  success: chalk.hex('#10b981'),   // Green
  warning: chalk.hex('#f59e0b'),   // Amber
  error: chalk.hex('#ef4444'),     // Red
  muted: chalk.gray,
};

/**
 * Print the Sluice banner/header.
 */
export function printBanner(): void {
  console.log('');
  console.log(BRAND.primary('  ╔══════════════════════════════════════╗'));
  console.log(BRAND.primary('  ║') + BRAND.secondary('   SLUICE - Transaction Execution     ') + BRAND.primary('║'));
  console.log(BRAND.primary('  ╚══════════════════════════════════════╝'));
  console.log('');
}

// ============================================================================
// Formatting
// ============================================================================

/** 0-1 rate as a percentage with one decimal */
export function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export function formatLatency(ms: number): string {
  if (ms >= 1_000) {
    return `${(ms / 1_000).toFixed(2)}s`;
  }
  return `${Math.round(ms)}ms`;
}

/** UTC timestamp, second precision */
export function formatTime(epochMs: number): string {
  return new Date(epochMs).toISOString().replace('T', ' ').slice(0, 19);
}

export function shortId(id: string): string {
  return id.length > 8 ? id.slice(0, 8) : id;
}

export function formatStatus(status: OrderStatus): string {
  switch (status) {
    case 'CONFIRMED':
      return BRAND.success(status);
    case 'FAILED':
      return BRAND.error(status);
    case 'UNKNOWN':
    case 'TIMED_OUT':
      return BRAND.warning(status);
    case 'CANCELLED':
      return BRAND.muted(status);
    default:
      return BRAND.secondary(status);
  }
}

function formatCircuit(state: 'CLOSED' | 'OPEN' | 'HALF_OPEN'): string {
  if (state === 'CLOSED') return BRAND.success(state);
  if (state === 'OPEN') return BRAND.error(state);
  return BRAND.warning(state);
}

/**
 * Create a visual success-rate bar.
 */
function getRateBar(rate: number): string {
  const filled = Math.round(rate * 10);
  const empty = 10 - filled;
  return BRAND.success('█'.repeat(filled)) + BRAND.muted('░'.repeat(empty));
}

// ============================================================================
// Messages
// ============================================================================

/**
 * Print an info message.
 */
export function printInfo(message: string): void {
  console.log(BRAND.secondary('  i ') + message);
}

/**
 * Print a success message.
 */
export function printSuccess(message: string): void {
  console.log(BRAND.success('  + ') + message);
}

/**
 * Print a warning message.
 */
export function printWarning(message: string): void {
  console.log(BRAND.warning('  ! ') + message);
}

/**
 * Print an error message.
 */
export function printError(message: string): void {
  console.log(BRAND.error('  x ') + message);
}

// ============================================================================
// Tables
// ============================================================================

/**
 * Print a formatted table with headers and rows.
 */
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.bold(h)),
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const row of rows) {
    table.push(row);
  }

  console.log(table.toString());
}

/** Two-column label/value listing */
export function printDetails(rows: Array<[string, string]>): void {
  const width = Math.max(...rows.map(([label]) => label.length));
  for (const [label, value] of rows) {
    console.log(BRAND.primary(`  ${label.padEnd(width)}  `) + chalk.white(value));
  }
}

export function printOrder(order: OrderView): void {
  const { intent } = order;
  const rows: Array<[string, string]> = [
    ['Order', order.id],
    ['Status', formatStatus(order.status)],
    ['Intent', `${intent.action} ${intent.size} ${intent.market}${intent.price === undefined ? '' : ` @ ${intent.price}`}`],
    ['Confidence', intent.confidence.toFixed(2)],
    ['Attempts', `${order.attemptCount} / ${order.maxRetries + 1}`],
    ['Created', formatTime(order.createdAt)],
    ['Updated', formatTime(order.updatedAt)],
  ];
  if (intent.clientOrderId) rows.push(['Client id', intent.clientOrderId]);
  if (order.executionMethod) rows.push(['Backend', order.executionMethod]);
  if (order.resultReference) rows.push(['Reference', order.resultReference]);
  if (order.lastError) rows.push(['Last error', `${order.lastError.kind}: ${order.lastError.message}`]);
  if (order.cancelRequested) rows.push(['Cancel', 'requested']);
  printDetails(rows);

  if (order.attempts.length > 0) {
    console.log('');
    printTable(
      ['Backend', 'Outcome', 'Error', 'Latency', 'Ended'],
      order.attempts.map((a) => [
        a.backend,
        a.outcome,
        a.errorKind ?? '-',
        formatLatency(a.latencyMs),
        formatTime(a.endedAt),
      ]),
    );
  }
}

export function printOrders(orders: OrderRecord[]): void {
  printTable(
    ['Order', 'Status', 'Intent', 'Attempts', 'Backend', 'Updated'],
    orders.map((o) => [
      shortId(o.id),
      formatStatus(o.status),
      `${o.intent.action} ${o.intent.size} ${o.intent.market}`,
      String(o.attemptCount),
      o.executionMethod ?? '-',
      formatTime(o.updatedAt),
    ]),
  );
}

export function printSystemStatus(status: SystemStatusReport): void {
  const engineState = !status.running ? BRAND.error('stopped') : status.paused ? BRAND.warning('paused') : BRAND.success('running');
  printDetails([
    ['Engine', engineState],
    ['Queued', String(status.queueDepth)],
    ['Backlog', String(status.backlogDepth)],
    ['Executing', String(status.activeCount)],
    ['Retry waits', String(status.pendingRetries)],
    ['Orders', `${status.orders.total} total, ${status.orders.active} active`],
    ['Settled OK', formatPercent(status.orders.successRate)],
  ]);

  console.log('');
  printTable(
    ['Backend', 'Circuit', 'Failures'],
    status.circuits.map((c) => [c.backend, formatCircuit(c.state), String(c.consecutiveFailures)]),
  );

  console.log('');
  printWindows([status.metrics]);
}

export function printWindows(windows: WindowReport[]): void {
  printTable(
    ['Window', 'Attempts', 'Success', 'Avg', 'p95', 'Per min'],
    windows.map((w) => [
      w.window,
      String(w.total),
      `${getRateBar(w.successRate)} ${formatPercent(w.successRate)}`,
      formatLatency(w.avgLatencyMs),
      formatLatency(w.p95LatencyMs),
      w.executionsPerMinute.toFixed(1),
    ]),
  );
}

export function printMetrics(report: MetricsReport): void {
  printWindows(report.windows);

  if (report.backends.length > 0) {
    console.log('');
    printTable(
      ['Backend', 'Attempts', 'Success', 'Median', 'Min', 'Max'],
      report.backends.map((b) => [
        b.backend,
        String(b.attempts),
        formatPercent(b.successRate),
        formatLatency(b.medianLatencyMs),
        formatLatency(b.minLatencyMs),
        formatLatency(b.maxLatencyMs),
      ]),
    );
  }

  const { totals } = report;
  console.log('');
  console.log(
    BRAND.muted(
      `  Since start: ${totals.attempts} attempts, ${totals.successes} ok, ${totals.failures} failed, ` +
        `${totals.timeouts} timed out, ${totals.unknowns} unknown`,
    ),
  );
}

/** Report a command failure and mark the process as failed */
export function printFailure(err: unknown): void {
  printError(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
