import type { CommandOutcome } from '../../shared/types';

export interface ICommandRunner {
  /** `args[0]` is the program. Resolves with the outcome on a non-zero exit instead of rejecting. */
  run(args: string[]): Promise<CommandOutcome>;
}
