// Command execution types
export interface CommandOutcome {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// Pull request types
export type PrState = 'OPEN' | 'MERGED' | 'CLOSED';

export interface PullRequestHandle {
  readonly branch: string;
  readonly number?: number;
}

export interface PollConfig {
  timeoutMinutes: number;
  pollIntervalSeconds: number;
}

export interface WaitForMergeOptions extends Omit<PollConfig, 'pollIntervalSeconds'> {
  pollIntervalSeconds?: number;
  prNumber?: number;
}

export type PrLookup = 'branch' | 'number';

export interface MergeResult {
  branch: string;
  prNumber?: number;
  attempts: number;
  via: PrLookup;
  elapsedMs: number;
}

export type PrQueryResult =
  | { kind: 'state'; state: PrState; via: PrLookup }
  | { kind: 'unrecognized'; raw: string; via: PrLookup }
  | { kind: 'failed'; exitCode: number; stderr: string };

// Poll state machine
export type PollState =
  | { kind: 'polling'; startedAt: number; deadline: number; attempts: number; lastState?: PrState }
  | { kind: 'merged'; startedAt: number; attempts: number; via: PrLookup }
  | { kind: 'closed'; startedAt: number; attempts: number }
  | { kind: 'timed_out'; startedAt: number; attempts: number };

// Release event log types
export type ReleaseEventCategory = 'git' | 'github' | 'poll' | 'system';
export type ReleaseEventSeverity = 'info' | 'warning' | 'error';

export interface ReleaseEvent {
  id: string;
  branch: string;
  category: ReleaseEventCategory;
  severity: ReleaseEventSeverity;
  message: string;
  data: Record<string, unknown>;
  createdAt: number;
}

export interface ReleaseEventCreateInput {
  branch: string;
  category: ReleaseEventCategory;
  severity?: ReleaseEventSeverity;
  message: string;
  data?: Record<string, unknown>;
}

export interface ReleaseEventFilter {
  branch?: string;
  category?: ReleaseEventCategory;
  severity?: ReleaseEventSeverity;
  since?: number;
  until?: number;
}

// Configuration
export interface ReleaseConfig extends PollConfig {
  remote: string;
  baseBranch: string;
}
