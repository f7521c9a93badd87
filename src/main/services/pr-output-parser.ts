import type { PrState } from '../../shared/types';

export type PrStateParseResult =
  | { ok: true; state: PrState }
  | { ok: false; reason: 'invalid_json' | 'missing_state' | 'unknown_state'; raw: string };

export type PrNumberParseResult =
  | { ok: true; number: number; raw: string }
  | { ok: false; raw: string };

const PR_STATES: readonly PrState[] = ['OPEN', 'MERGED', 'CLOSED'];

const NO_PULL_REQUESTS_PATTERN = /no pull requests found/i;

function isPrState(value: string): value is PrState {
  return (PR_STATES as readonly string[]).includes(value);
}

/**
 * Parse the JSON printed by `gh pr view <ref> --json state`.
 * Never throws; format drift comes back as `ok: false` with the raw text.
 */
export function parsePrState(stdout: string): PrStateParseResult {
  const raw = stdout.trim();
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { ok: false, reason: 'invalid_json', raw };
  }

  if (typeof data !== 'object' || data === null || !('state' in data) || typeof data.state !== 'string') {
    return { ok: false, reason: 'missing_state', raw };
  }

  const state = data.state.toUpperCase();
  if (!isPrState(state)) {
    return { ok: false, reason: 'unknown_state', raw };
  }
  return { ok: true, state };
}

/**
 * Extract the PR number from the URL `gh pr create` prints, e.g.
 * `https://github.com/org/repo/pull/456` -> 456. gh may print notices
 * before the URL, so only the last non-empty line is considered.
 */
export function parsePrNumber(stdout: string): PrNumberParseResult {
  const lines = stdout.split('\n').map((line) => line.trim()).filter(Boolean);
  const raw = lines.length > 0 ? lines[lines.length - 1] : '';
  const segments = raw.replace(/\/+$/, '').split('/');
  const last = segments[segments.length - 1];

  if (!/^\d+$/.test(last)) {
    return { ok: false, raw };
  }
  return { ok: true, number: parseInt(last, 10), raw };
}

/** True when gh reports the branch has no PR, which is what a deleted head branch looks like. */
export function isNoPullRequestsFound(stderr: string): boolean {
  return NO_PULL_REQUESTS_PATTERN.test(stderr);
}
