import { Command } from 'commander';
import ora from 'ora';
import { SluiceApiClient } from '../utils/api-client.js';
import { loadConfig } from '../utils/config.js';
import { printBanner, printFailure, printInfo, printSystemStatus } from '../utils/display.js';

/**
 * Register the `sluice status` command.
 *
 * Shows engine state, queue depths, circuit breakers, the 5 minute
 * metrics window and order counts.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show engine state, circuit breakers and recent throughput')
    .option('--api <url>', 'Worker API base URL')
    .action(async (options: { api?: string }) => {
      printBanner();

      const config = loadConfig(options.api);
      const spinner = ora({ text: `Connecting to ${config.apiUrl}...`, color: 'cyan' }).start();
      try {
        const status = await new SluiceApiClient(config.apiUrl).getStatus();
        spinner.succeed(`Connected to ${config.apiUrl}`);
        console.log('');
        printSystemStatus(status);
      } catch (err) {
        spinner.fail(`Failed to reach ${config.apiUrl}`);
        printInfo('Is the worker running? Set SLUICE_API_URL or pass --api.');
        printFailure(err);
      }
    });
}
