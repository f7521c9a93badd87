import { Command } from 'commander';
import type { AppServices } from '../../main/providers/setup';
import type { ReleaseEventCategory } from '../../shared/types';
import { output, type OutputOptions } from '../output';

const CATEGORIES: readonly ReleaseEventCategory[] = ['git', 'github', 'poll', 'system'];

function isCategory(value: string): value is ReleaseEventCategory {
  return (CATEGORIES as readonly string[]).includes(value);
}

export function registerEventsCommands(program: Command, getServices: () => AppServices): void {
  const events = program.command('events').description('View release events');

  events
    .command('list')
    .description('List events')
    .requiredOption('--branch <branch>', 'Release branch')
    .option('--category <cat>', `Filter by category (${CATEGORIES.join(', ')})`)
    .action(async (cmdOpts: { branch: string; category?: string }) => {
      const opts = program.opts<OutputOptions>();
      if (cmdOpts.category !== undefined && !isCategory(cmdOpts.category)) {
        throw new Error(`Unknown category: ${cmdOpts.category}`);
      }
      const list = await getServices().eventLog.getEvents({
        branch: cmdOpts.branch,
        category: cmdOpts.category,
      });
      const rows = list.map((e) => ({
        id: e.id,
        category: e.category,
        severity: e.severity,
        message: e.message,
        createdAt: new Date(e.createdAt).toISOString(),
      }));
      output(rows, opts);
    });
}
