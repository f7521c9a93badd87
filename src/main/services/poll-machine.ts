import type { PollState, PrQueryResult } from '../../shared/types';

export function startPolling(now: number, timeoutMs: number): PollState {
  return { kind: 'polling', startedAt: now, deadline: now + timeoutMs, attempts: 0 };
}

export function isFinished(state: PollState): boolean {
  return state.kind !== 'polling';
}

/**
 * Apply one query result. A terminal PR state wins even when observed at
 * or past the deadline; anything else times out once `now` reaches it.
 * Finished states are returned unchanged.
 */
export function nextPollState(state: PollState, result: PrQueryResult, now: number): PollState {
  if (state.kind !== 'polling') return state;

  const attempts = state.attempts + 1;
  const { startedAt } = state;

  if (result.kind === 'state') {
    if (result.state === 'MERGED') return { kind: 'merged', startedAt, attempts, via: result.via };
    if (result.state === 'CLOSED') return { kind: 'closed', startedAt, attempts };
  }

  if (now >= state.deadline) {
    return { kind: 'timed_out', startedAt, attempts };
  }

  const lastState = result.kind === 'state' ? result.state : state.lastState;
  return { ...state, attempts, lastState };
}

/** Checked after each sleep so no query is issued once the deadline has passed. */
export function expireIfDue(state: PollState, now: number): PollState {
  if (state.kind !== 'polling' || now < state.deadline) return state;
  return { kind: 'timed_out', startedAt: state.startedAt, attempts: state.attempts };
}
