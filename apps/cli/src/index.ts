import { Command } from 'commander';
import { registerSubmitCommand } from './commands/submit.js';
import { registerOrderCommands } from './commands/order.js';
import { registerCancelCommand } from './commands/cancel.js';
import { registerStatusCommand } from './commands/status.js';
import { registerMetricsCommand } from './commands/metrics.js';
import { registerEngineCommand } from './commands/engine.js';

const program = new Command();

program
  .name('sluice')
  .description('Sluice - operator CLI for the transaction execution engine')
  .version('0.1.0');

// Register commands
registerSubmitCommand(program);
registerOrderCommands(program);
registerCancelCommand(program);
registerStatusCommand(program);
registerMetricsCommand(program);
registerEngineCommand(program);

// Parse and execute
await program.parseAsync();
