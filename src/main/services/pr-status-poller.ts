import type { ICommandRunner } from '../interfaces/command-runner';
import type { IClock } from '../interfaces/clock';
import type { IReleaseEventLog } from '../interfaces/release-event-log';
import type { IPrStatusPoller } from '../interfaces/pr-status-poller';
import type {
  MergeResult,
  PollState,
  PrLookup,
  PrQueryResult,
  ReleaseEventSeverity,
  WaitForMergeOptions,
} from '../../shared/types';
import { ReleaseError } from '../../shared/errors';
import { isNoPullRequestsFound, parsePrState } from './pr-output-parser';
import { expireIfDue, isFinished, nextPollState, startPolling } from './poll-machine';

export const DEFAULT_POLL_INTERVAL_SECONDS = 30;

export interface PrStatusPollerDeps {
  runner: ICommandRunner;
  clock: IClock;
  eventLog: IReleaseEventLog;
  defaultPollIntervalSeconds?: number;
}

function describePr(branch: string, prNumber?: number): string {
  return prNumber !== undefined ? `#${prNumber} (branch "${branch}")` : `for branch "${branch}"`;
}

export class PrStatusPoller implements IPrStatusPoller {
  private defaultPollIntervalSeconds: number;

  constructor(private deps: PrStatusPollerDeps) {
    this.defaultPollIntervalSeconds = deps.defaultPollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS;
  }

  async waitForMerge(branch: string, options: WaitForMergeOptions): Promise<MergeResult> {
    const { timeoutMinutes, prNumber } = options;
    const pollIntervalSeconds = options.pollIntervalSeconds ?? this.defaultPollIntervalSeconds;

    if (!Number.isFinite(timeoutMinutes) || timeoutMinutes < 0) {
      throw ReleaseError.invalidOptions(`timeoutMinutes must be a non-negative number, got ${timeoutMinutes}`);
    }
    if (!Number.isFinite(pollIntervalSeconds) || pollIntervalSeconds <= 0) {
      throw ReleaseError.invalidOptions(`pollIntervalSeconds must be a positive number, got ${pollIntervalSeconds}`);
    }

    const { clock } = this.deps;
    const ref = describePr(branch, prNumber);
    const pollLog = (message: string, severity: ReleaseEventSeverity = 'info', data?: Record<string, unknown>) =>
      this.deps.eventLog.log({ branch, category: 'poll', severity, message, data });

    await pollLog(`Waiting for PR ${ref} to be merged`, 'info', { timeoutMinutes, pollIntervalSeconds, prNumber });

    let state: PollState = startPolling(clock.now(), timeoutMinutes * 60_000);

    while (!isFinished(state)) {
      const result = await this.queryStatus(branch, prNumber);
      const previous = state.kind === 'polling' ? state.lastState : undefined;
      state = nextPollState(state, result, clock.now());

      if (result.kind === 'failed') {
        await pollLog(`PR status query failed (exit ${result.exitCode}), retrying`, 'warning', { stderr: result.stderr });
      } else if (result.kind === 'unrecognized') {
        await pollLog('PR status output not recognized, retrying', 'warning', { raw: result.raw });
      } else if (state.kind === 'polling' && result.state !== previous) {
        await pollLog(`PR ${ref} is ${result.state}`, 'info', { state: result.state, via: result.via });
      }

      if (isFinished(state)) break;
      await clock.sleep(pollIntervalSeconds);
      state = expireIfDue(state, clock.now());
    }

    const elapsedMs = clock.now() - state.startedAt;

    switch (state.kind) {
      case 'merged':
        await pollLog(`PR ${ref} merged`, 'info', { attempts: state.attempts, via: state.via, elapsedMs });
        return { branch, prNumber, attempts: state.attempts, via: state.via, elapsedMs };
      case 'closed':
        await pollLog(`PR ${ref} closed without merging`, 'error', { attempts: state.attempts });
        throw ReleaseError.prClosed(ref);
      default:
        await pollLog(`Timed out after ${timeoutMinutes} minute(s) waiting for PR ${ref}`, 'error', {
          attempts: state.attempts,
          elapsedMs,
        });
        throw ReleaseError.timeout(ref, timeoutMinutes);
    }
  }

  /**
   * One poll: query by branch, and when gh says the branch has no PR
   * (deleted after merge) retry once by number if it is known.
   */
  private async queryStatus(branch: string, prNumber?: number): Promise<PrQueryResult> {
    const byBranch = await this.view(branch, 'branch');
    if (byBranch.kind !== 'failed' || prNumber === undefined || !isNoPullRequestsFound(byBranch.stderr)) {
      return byBranch;
    }

    await this.deps.eventLog.log({
      branch,
      category: 'poll',
      message: `No PR found for branch "${branch}", looking up #${prNumber} instead`,
      data: { prNumber },
    });
    return this.view(String(prNumber), 'number');
  }

  private async view(ref: string, via: PrLookup): Promise<PrQueryResult> {
    const outcome = await this.deps.runner.run(['gh', 'pr', 'view', ref, '--json', 'state']);
    if (outcome.exitCode !== 0) {
      return { kind: 'failed', exitCode: outcome.exitCode, stderr: outcome.stderr };
    }

    const parsed = parsePrState(outcome.stdout);
    if (!parsed.ok) {
      return { kind: 'unrecognized', raw: parsed.raw, via };
    }
    return { kind: 'state', state: parsed.state, via };
  }
}
