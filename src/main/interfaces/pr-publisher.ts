import type { PullRequestHandle } from '../../shared/types';

export interface IPrPublisher {
  publish(branch: string, version: string): Promise<PullRequestHandle | null>;
  createPullRequest(branch: string, version: string): Promise<number | undefined>;
}
