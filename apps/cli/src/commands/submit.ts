import { Command } from 'commander';
import ora from 'ora';
import { tradingIntentSchema } from '@sluice/types';
import { SluiceApiClient } from '../utils/api-client.js';
import { loadConfig } from '../utils/config.js';
import { waitForSettlement } from '../utils/wait.js';
import { printError, printFailure, printOrder, printSuccess, printWarning } from '../utils/display.js';

interface SubmitCommandOptions {
  price?: string;
  confidence: string;
  clientId?: string;
  wait?: boolean;
  timeout: string;
  api?: string;
}

/**
 * Register the `sluice submit` command.
 *
 * Validates the intent locally, posts it to the worker and, with --wait,
 * follows the order until it settles.
 */
export function registerSubmitCommand(program: Command): void {
  program
    .command('submit')
    .description('Submit a trading intent for execution')
    .argument('<action>', 'BUY or SELL')
    .argument('<market>', 'Market symbol, e.g. SOL-USDC')
    .argument('<size>', 'Size in base units of the market')
    .option('--price <price>', 'Limit price')
    .option('--confidence <confidence>', 'Strategy confidence between 0 and 1', '1')
    .option('--client-id <id>', 'Idempotency key; resubmitting it returns the same order')
    .option('--wait', 'Wait until the order settles')
    .option('--timeout <ms>', 'How long --wait waits', '120000')
    .option('--api <url>', 'Worker API base URL')
    .action(async (action: string, market: string, size: string, options: SubmitCommandOptions) => {
      const parsed = tradingIntentSchema.safeParse({
        action: action.toUpperCase(),
        market,
        size: Number(size),
        price: options.price === undefined ? undefined : Number(options.price),
        confidence: Number(options.confidence),
        clientOrderId: options.clientId,
      });
      if (!parsed.success) {
        printError(`Invalid intent: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
        process.exitCode = 1;
        return;
      }

      const config = loadConfig(options.api);
      const client = new SluiceApiClient(config.apiUrl);

      const spinner = ora({ text: 'Submitting intent...', color: 'cyan' }).start();
      let orderId: string;
      try {
        orderId = await client.submit(parsed.data);
        spinner.succeed(`Order accepted: ${orderId}`);
      } catch (err) {
        spinner.fail('Submission rejected');
        printFailure(err);
        return;
      }

      if (!options.wait) {
        printSuccess(`Track it with: sluice order ${orderId}`);
        return;
      }

      const waitSpinner = ora({ text: 'Waiting for settlement...', color: 'cyan' }).start();
      try {
        const { order, settled } = await waitForSettlement(client, orderId, {
          timeoutMs: Number(options.timeout),
          intervalMs: 1_000,
          onStatus: (status) => {
            waitSpinner.text = `Order is ${status}...`;
          },
        });
        waitSpinner.stop();
        printOrder(order);
        if (!settled) {
          printWarning(`Still ${order.status} after ${options.timeout}ms`);
        } else if (order.status !== 'CONFIRMED') {
          process.exitCode = 1;
        }
      } catch (err) {
        waitSpinner.fail('Lost track of the order');
        printFailure(err);
      }
    });
}
