export type ReleaseErrorKind =
  | 'push_failed'
  | 'pr_create_failed'
  | 'pr_closed'
  | 'timeout'
  | 'invalid_options';

export class ReleaseError extends Error {
  constructor(message: string, public readonly kind: ReleaseErrorKind) {
    super(message);
    this.name = 'ReleaseError';
  }

  static pushFailed(branch: string, remote: string, stderr: string): ReleaseError {
    return new ReleaseError(
      `Failed to push branch "${branch}" to ${remote}${formatDetail(stderr)}`,
      'push_failed',
    );
  }

  static prCreateFailed(branch: string, stderr: string): ReleaseError {
    return new ReleaseError(
      `Failed to create pull request for branch "${branch}"${formatDetail(stderr)}`,
      'pr_create_failed',
    );
  }

  static prClosed(ref: string): ReleaseError {
    return new ReleaseError(`PR ${ref} was closed without merging`, 'pr_closed');
  }

  static timeout(ref: string, timeoutMinutes: number): ReleaseError {
    return new ReleaseError(
      `Timeout after ${timeoutMinutes} minute(s) waiting for PR ${ref} to be merged`,
      'timeout',
    );
  }

  static invalidOptions(message: string): ReleaseError {
    return new ReleaseError(`Invalid options: ${message}`, 'invalid_options');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatDetail(stderr: string): string {
  const detail = stderr.trim();
  return detail ? `: ${detail}` : '';
}
