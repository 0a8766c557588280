import { setTimeout as sleep } from 'node:timers/promises';
import { isTerminalStatus, type OrderStatus } from '@sluice/types';
import type { OrderView, SluiceApiClient } from './api-client.js';

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  /** Called whenever the observed status changes */
  onStatus?: (status: OrderStatus) => void;
}

export interface WaitResult {
  order: OrderView;
  settled: boolean;
}

/**
 * Poll an order until it reaches a terminal status or the timeout passes.
 * Returns the last view either way.
 */
export async function waitForSettlement(
  client: SluiceApiClient,
  orderId: string,
  options: WaitOptions,
): Promise<WaitResult> {
  const deadline = Date.now() + options.timeoutMs;
  let last: OrderStatus | undefined;

  for (;;) {
    const order = await client.getOrder(orderId);
    if (order.status !== last) {
      last = order.status;
      options.onStatus?.(order.status);
    }
    if (isTerminalStatus(order.status)) return { order, settled: true };
    if (Date.now() >= deadline) return { order, settled: false };
    await sleep(options.intervalMs);
  }
}
