import { Command } from 'commander';
import type { AppServices } from '../main/providers/setup';
import { registerPrCommands } from './commands/pr';
import { registerEventsCommands } from './commands/events';

export function createProgram(getServices: () => AppServices): Command {
  const program = new Command();

  program
    .name('release-pr')
    .description('Open release pull requests and wait for them to be merged')
    .version('1.0.0')
    .option('--json', 'Output as JSON')
    .option('--quiet', 'Minimal output (PR numbers and IDs only)')
    .option('--db <path>', 'Event log database path');

  registerPrCommands(program, getServices);
  registerEventsCommands(program, getServices);

  return program;
}
