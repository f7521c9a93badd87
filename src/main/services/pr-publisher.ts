import type { ICommandRunner } from '../interfaces/command-runner';
import type { IReleaseEventLog } from '../interfaces/release-event-log';
import type { IPrPublisher } from '../interfaces/pr-publisher';
import type { PullRequestHandle, ReleaseEventCategory, ReleaseEventSeverity } from '../../shared/types';
import { ReleaseError } from '../../shared/errors';
import { parsePrNumber } from './pr-output-parser';

export interface PrPublisherDeps {
  runner: ICommandRunner;
  eventLog: IReleaseEventLog;
  remote?: string;
  baseBranch?: string;
  dryRun?: boolean;
}

export class PrPublisher implements IPrPublisher {
  constructor(private deps: PrPublisherDeps) {}

  private get remote(): string {
    return this.deps.remote ?? 'origin';
  }

  private get baseBranch(): string {
    return this.deps.baseBranch ?? 'main';
  }

  async createPullRequest(branch: string, version: string): Promise<number | undefined> {
    const handle = await this.publish(branch, version);
    return handle?.number;
  }

  /**
   * Push `branch` and open a release PR for it. Resolves `null` when gh is
   * not usable (PR automation is optional) or in dry-run mode.
   */
  async publish(branch: string, version: string): Promise<PullRequestHandle | null> {
    const { runner } = this.deps;
    const log = (category: ReleaseEventCategory, message: string, severity: ReleaseEventSeverity = 'info', data?: Record<string, unknown>) =>
      this.deps.eventLog.log({ branch, category, severity, message, data });

    const probe = await runner.run(['gh', '--version']);
    if (probe.exitCode !== 0) {
      await log('system', 'gh CLI not available, skipping pull request creation', 'warning', {
        exitCode: probe.exitCode,
        stderr: probe.stderr,
      });
      return null;
    }

    const pushArgs = ['git', 'push', '-u', this.remote, branch];
    const createArgs = [
      'gh', 'pr', 'create',
      '--title', `Release ${version}`,
      '--body', `Automated release pull request for version ${version}.`,
      '--head', branch,
      '--base', this.baseBranch,
    ];

    if (this.deps.dryRun) {
      await log('system', 'Dry run: skipping push and pull request creation', 'info', {
        commands: [pushArgs.join(' '), createArgs.join(' ')],
      });
      return null;
    }

    const push = await runner.run(pushArgs);
    if (push.exitCode !== 0) {
      await log('git', `Failed to push branch to ${this.remote}`, 'error', { stderr: push.stderr });
      throw ReleaseError.pushFailed(branch, this.remote, push.stderr);
    }
    await log('git', `Pushed branch to ${this.remote}`);

    const create = await runner.run(createArgs);
    if (create.exitCode !== 0) {
      await log('github', 'Failed to create pull request', 'error', { stderr: create.stderr });
      throw ReleaseError.prCreateFailed(branch, create.stderr);
    }

    const parsed = parsePrNumber(create.stdout);
    if (!parsed.ok) {
      await log('github', 'Pull request created but its number could not be read from gh output', 'warning', {
        output: parsed.raw,
      });
      return { branch };
    }

    await log('github', `Pull request #${parsed.number} created`, 'info', { number: parsed.number, url: parsed.raw });
    return { branch, number: parsed.number };
  }
}
