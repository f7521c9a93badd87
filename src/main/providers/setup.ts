import type Database from 'better-sqlite3';
import type { ICommandRunner } from '../interfaces/command-runner';
import type { IClock } from '../interfaces/clock';
import type { IReleaseEventLog } from '../interfaces/release-event-log';
import type { IPrPublisher } from '../interfaces/pr-publisher';
import type { IPrStatusPoller } from '../interfaces/pr-status-poller';
import type { ReleaseConfig } from '../../shared/types';
import { SqliteReleaseEventLog } from '../stores/sqlite-release-event-log';
import { ProcessCommandRunner } from '../services/process-command-runner';
import { SystemClock } from '../services/system-clock';
import { PrPublisher } from '../services/pr-publisher';
import { PrStatusPoller } from '../services/pr-status-poller';
import { getResolvedConfig } from '../services/config-service';

export interface PublisherOverrides {
  remote?: string;
  baseBranch?: string;
  dryRun?: boolean;
}

export interface AppServices {
  config: ReleaseConfig;
  eventLog: IReleaseEventLog;
  createPublisher(overrides?: PublisherOverrides): IPrPublisher;
  createPoller(): IPrStatusPoller;
}

export interface AppServicesOptions {
  cwd?: string;
  config?: ReleaseConfig;
  runner?: ICommandRunner;
  clock?: IClock;
}

export function createAppServices(db: Database.Database, options: AppServicesOptions = {}): AppServices {
  const cwd = options.cwd ?? process.cwd();
  const config = options.config ?? getResolvedConfig(cwd);
  const eventLog = new SqliteReleaseEventLog(db);
  const runner = options.runner ?? new ProcessCommandRunner({ cwd });
  const clock = options.clock ?? new SystemClock();

  return {
    config,
    eventLog,
    createPublisher: (overrides = {}) => new PrPublisher({
      runner,
      eventLog,
      remote: overrides.remote ?? config.remote,
      baseBranch: overrides.baseBranch ?? config.baseBranch,
      dryRun: overrides.dryRun,
    }),
    createPoller: () => new PrStatusPoller({
      runner,
      clock,
      eventLog,
      defaultPollIntervalSeconds: config.pollIntervalSeconds,
    }),
  };
}
