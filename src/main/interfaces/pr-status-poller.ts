import type { MergeResult, WaitForMergeOptions } from '../../shared/types';

export interface IPrStatusPoller {
  waitForMerge(branch: string, options: WaitForMergeOptions): Promise<MergeResult>;
}
