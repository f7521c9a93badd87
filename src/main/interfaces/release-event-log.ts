import type { ReleaseEvent, ReleaseEventCreateInput, ReleaseEventFilter } from '../../shared/types';

export interface IReleaseEventLog {
  log(input: ReleaseEventCreateInput): Promise<ReleaseEvent>;
  getEvents(filter?: ReleaseEventFilter): Promise<ReleaseEvent[]>;
}
