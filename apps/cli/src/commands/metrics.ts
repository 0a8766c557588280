import { Command } from 'commander';
import { METRICS_WINDOWS, type MetricsWindowName } from '@sluice/types';
import { SluiceApiClient } from '../utils/api-client.js';
import { loadConfig } from '../utils/config.js';
import { printError, printFailure, printMetrics, printWindows } from '../utils/display.js';

function isWindow(value: string): value is MetricsWindowName {
  return METRICS_WINDOWS.some((w) => w === value);
}

/**
 * Register the `sluice metrics` command.
 */
export function registerMetricsCommand(program: Command): void {
  program
    .command('metrics')
    .description('Show execution metrics per window and per backend')
    .option('--window <window>', `One window only: ${METRICS_WINDOWS.join(', ')}`)
    .option('--api <url>', 'Worker API base URL')
    .action(async (options: { window?: string; api?: string }) => {
      const client = new SluiceApiClient(loadConfig(options.api).apiUrl);
      try {
        if (options.window === undefined) {
          printMetrics(await client.getMetrics());
          return;
        }
        if (!isWindow(options.window)) {
          printError(`Unknown window "${options.window}". Use one of ${METRICS_WINDOWS.join(', ')}`);
          process.exitCode = 1;
          return;
        }
        printWindows([await client.getWindow(options.window)]);
      } catch (err) {
        printFailure(err);
      }
    });
}
