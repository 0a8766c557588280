import { Command } from 'commander';
import { SluiceApiClient } from '../utils/api-client.js';
import { loadConfig } from '../utils/config.js';
import { printFailure, printSuccess } from '../utils/display.js';

/**
 * Register `sluice engine pause` and `sluice engine resume`.
 */
export function registerEngineCommand(program: Command): void {
  const engine = program.command('engine').description('Control the execution engine');

  for (const paused of [true, false]) {
    engine
      .command(paused ? 'pause' : 'resume')
      .description(paused ? 'Stop taking new orders off the queue' : 'Resume taking orders off the queue')
      .option('--api <url>', 'Worker API base URL')
      .action(async (options: { api?: string }) => {
        try {
          const now = await new SluiceApiClient(loadConfig(options.api).apiUrl).setPaused(paused);
          printSuccess(now ? 'Engine paused' : 'Engine resumed');
        } catch (err) {
          printFailure(err);
        }
      });
  }
}
