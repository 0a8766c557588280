import { Command } from 'commander';
import ora from 'ora';
import { SluiceApiClient } from '../utils/api-client.js';
import { loadConfig } from '../utils/config.js';
import { waitForSettlement } from '../utils/wait.js';
import { printFailure, printOrder, printOrders, printWarning } from '../utils/display.js';

/**
 * Register `sluice order <id>` and `sluice orders`.
 */
export function registerOrderCommands(program: Command): void {
  program
    .command('order')
    .description('Show one order with its execution attempts')
    .argument('<id>', 'Order id')
    .option('--wait', 'Wait until the order settles')
    .option('--timeout <ms>', 'How long --wait waits', '120000')
    .option('--api <url>', 'Worker API base URL')
    .action(async (id: string, options: { wait?: boolean; timeout: string; api?: string }) => {
      const client = new SluiceApiClient(loadConfig(options.api).apiUrl);
      try {
        if (!options.wait) {
          printOrder(await client.getOrder(id));
          return;
        }

        const spinner = ora({ text: 'Waiting for settlement...', color: 'cyan' }).start();
        const { order, settled } = await waitForSettlement(client, id, {
          timeoutMs: Number(options.timeout),
          intervalMs: 1_000,
          onStatus: (status) => {
            spinner.text = `Order is ${status}...`;
          },
        }).finally(() => spinner.stop());
        printOrder(order);
        if (!settled) printWarning(`Still ${order.status} after ${options.timeout}ms`);
      } catch (err) {
        printFailure(err);
      }
    });

  program
    .command('orders')
    .description('List the most recently updated orders')
    .option('--limit <n>', 'How many orders to show', '20')
    .option('--api <url>', 'Worker API base URL')
    .action(async (options: { limit: string; api?: string }) => {
      const client = new SluiceApiClient(loadConfig(options.api).apiUrl);
      try {
        const orders = await client.listOrders(Number(options.limit));
        if (orders.length === 0) {
          printWarning('No orders yet');
          return;
        }
        printOrders(orders);
      } catch (err) {
        printFailure(err);
      }
    });
}
