import { Command } from 'commander';
import { SluiceApiClient } from '../utils/api-client.js';
import { loadConfig } from '../utils/config.js';
import { printFailure, printSuccess, printWarning } from '../utils/display.js';

/**
 * Register the `sluice cancel` command.
 */
export function registerCancelCommand(program: Command): void {
  program
    .command('cancel')
    .description('Cancel an order that has not been broadcast yet')
    .argument('<id>', 'Order id')
    .option('--api <url>', 'Worker API base URL')
    .action(async (id: string, options: { api?: string }) => {
      const client = new SluiceApiClient(loadConfig(options.api).apiUrl);
      try {
        const result = await client.cancel(id);
        if (result.accepted) {
          printSuccess(`${id}: ${result.note}`);
        } else {
          printWarning(`${id}: ${result.note}`);
        }
      } catch (err) {
        printFailure(err);
      }
    });
}
