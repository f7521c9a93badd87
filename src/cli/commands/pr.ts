import { Command } from 'commander';
import type { AppServices } from '../../main/providers/setup';
import type { MergeResult } from '../../shared/types';
import { output, type OutputOptions } from '../output';
import { parseNonNegativeNumber, parsePositiveNumber, parsePrNumberOption } from './options';

interface PublishOpts {
  base?: string;
  remote?: string;
  dryRun?: boolean;
}

interface WaitOpts {
  pr?: number;
  timeout?: number;
  interval?: number;
}

function mergeSummary(result: MergeResult): Record<string, unknown> {
  return {
    branch: result.branch,
    number: result.prNumber ?? null,
    state: 'MERGED',
    via: result.via,
    attempts: result.attempts,
    elapsedSeconds: Math.round(result.elapsedMs / 1000),
  };
}

export function registerPrCommands(program: Command, getServices: () => AppServices): void {
  program
    .command('create')
    .description('Push a release branch and open its pull request')
    .argument('<branch>', 'Release branch')
    .argument('<version>', 'Release version')
    .option('--base <branch>', 'Base branch for the pull request')
    .option('--remote <name>', 'Remote to push to')
    .option('--dry-run', 'Show what would run without pushing or creating')
    .action(async (branch: string, version: string, cmdOpts: PublishOpts) => {
      const opts = program.opts<OutputOptions>();
      const publisher = getServices().createPublisher({
        baseBranch: cmdOpts.base,
        remote: cmdOpts.remote,
        dryRun: cmdOpts.dryRun,
      });

      const handle = await publisher.publish(branch, version);
      if (!handle) {
        if (opts.json) {
          output({ branch, created: false, number: null }, opts);
        } else if (!opts.quiet) {
          console.log('No pull request created.');
        }
        return;
      }
      output({ branch: handle.branch, created: true, number: handle.number ?? null }, opts, 'number');
    });

  program
    .command('wait')
    .description('Wait for the pull request of a release branch to be merged')
    .argument('<branch>', 'Release branch')
    .option('--pr <number>', 'Pull request number, used once the branch is gone', parsePrNumberOption)
    .option('--timeout <minutes>', 'Give up after this many minutes', parseNonNegativeNumber)
    .option('--interval <seconds>', 'Seconds between status checks', parsePositiveNumber)
    .action(async (branch: string, cmdOpts: WaitOpts) => {
      const opts = program.opts<OutputOptions>();
      const services = getServices();
      const result = await services.createPoller().waitForMerge(branch, {
        timeoutMinutes: cmdOpts.timeout ?? services.config.timeoutMinutes,
        pollIntervalSeconds: cmdOpts.interval,
        prNumber: cmdOpts.pr,
      });
      output(mergeSummary(result), opts, 'number');
    });

  program
    .command('release')
    .description('Push, open the release pull request and wait for it to be merged')
    .argument('<branch>', 'Release branch')
    .argument('<version>', 'Release version')
    .option('--base <branch>', 'Base branch for the pull request')
    .option('--remote <name>', 'Remote to push to')
    .option('--timeout <minutes>', 'Give up after this many minutes', parseNonNegativeNumber)
    .option('--interval <seconds>', 'Seconds between status checks', parsePositiveNumber)
    .action(async (branch: string, version: string, cmdOpts: PublishOpts & WaitOpts) => {
      const opts = program.opts<OutputOptions>();
      const services = getServices();

      const handle = await services
        .createPublisher({ baseBranch: cmdOpts.base, remote: cmdOpts.remote })
        .publish(branch, version);
      if (!handle) {
        if (!opts.quiet) {
          console.log('No pull request created; merge the release branch manually.');
        }
        return;
      }

      const result = await services.createPoller().waitForMerge(handle.branch, {
        timeoutMinutes: cmdOpts.timeout ?? services.config.timeoutMinutes,
        pollIntervalSeconds: cmdOpts.interval,
        prNumber: handle.number,
      });
      output(mergeSummary(result), opts, 'number');
    });
}
