import { describe, it, expect } from 'vitest';
import { expireIfDue, isFinished, nextPollState, startPolling } from '../../src/main/services/poll-machine';
import type { PollState, PrQueryResult } from '../../src/shared/types';

const open: PrQueryResult = { kind: 'state', state: 'OPEN', via: 'branch' };
const merged: PrQueryResult = { kind: 'state', state: 'MERGED', via: 'number' };
const closed: PrQueryResult = { kind: 'state', state: 'CLOSED', via: 'branch' };
const failed: PrQueryResult = { kind: 'failed', exitCode: 1, stderr: 'HTTP 502' };
const unrecognized: PrQueryResult = { kind: 'unrecognized', raw: '{"state":"DRAFT"}', via: 'branch' };

describe('poll-machine', () => {
  it('starts polling with an absolute deadline', () => {
    expect(startPolling(1000, 60_000)).toEqual({ kind: 'polling', startedAt: 1000, deadline: 61_000, attempts: 0 });
  });

  it('keeps polling on a non-terminal state and remembers it', () => {
    const next = nextPollState(startPolling(1000, 60_000), open, 2000);
    expect(next).toEqual({ kind: 'polling', startedAt: 1000, deadline: 61_000, attempts: 1, lastState: 'OPEN' });
  });

  it('keeps the last observed state across failed and unrecognized queries', () => {
    let state = nextPollState(startPolling(0, 60_000), open, 0);
    state = nextPollState(state, failed, 10_000);
    state = nextPollState(state, unrecognized, 20_000);
    expect(state).toEqual({ kind: 'polling', startedAt: 0, deadline: 60_000, attempts: 3, lastState: 'OPEN' });
  });

  it('moves to merged and records how the PR was found', () => {
    expect(nextPollState(startPolling(0, 60_000), merged, 5000)).toEqual({
      kind: 'merged',
      startedAt: 0,
      attempts: 1,
      via: 'number',
    });
  });

  it('moves to closed', () => {
    expect(nextPollState(startPolling(0, 60_000), closed, 5000)).toEqual({ kind: 'closed', startedAt: 0, attempts: 1 });
  });

  it('lets a terminal state win at the deadline', () => {
    expect(nextPollState(startPolling(0, 60_000), merged, 90_000).kind).toBe('merged');
    expect(nextPollState(startPolling(0, 60_000), closed, 60_000).kind).toBe('closed');
  });

  it('times out when a non-terminal result arrives at the deadline', () => {
    expect(nextPollState(startPolling(0, 60_000), open, 60_000)).toEqual({ kind: 'timed_out', startedAt: 0, attempts: 1 });
    expect(nextPollState(startPolling(0, 60_000), failed, 70_000)).toEqual({ kind: 'timed_out', startedAt: 0, attempts: 1 });
  });

  it('leaves finished states untouched', () => {
    const done: PollState = { kind: 'merged', startedAt: 0, attempts: 2, via: 'branch' };
    expect(nextPollState(done, closed, 1000)).toBe(done);
    expect(expireIfDue(done, 1_000_000)).toBe(done);
    expect(isFinished(done)).toBe(true);
  });

  describe('expireIfDue', () => {
    it('keeps polling before the deadline', () => {
      const state = startPolling(0, 60_000);
      expect(expireIfDue(state, 59_999)).toBe(state);
      expect(isFinished(state)).toBe(false);
    });

    it('times out once the deadline is reached', () => {
      const state = nextPollState(startPolling(0, 60_000), open, 0);
      expect(expireIfDue(state, 60_000)).toEqual({ kind: 'timed_out', startedAt: 0, attempts: 1 });
    });
  });
});
