import type { CommandOutcome } from '../../shared/types';
import type { ICommandRunner } from '../interfaces/command-runner';

interface Script {
  prefix: string[];
  outcomes: CommandOutcome[];
}

export function ok(stdout = ''): CommandOutcome {
  return { exitCode: 0, stdout, stderr: '' };
}

export function fail(stderr = '', exitCode = 1): CommandOutcome {
  return { exitCode, stdout: '', stderr };
}

/**
 * Scripted runner. Outcomes are registered per argument prefix and
 * consumed in order; the last one repeats. The longest matching prefix
 * wins, and unmatched commands succeed with empty output.
 */
export class StubCommandRunner implements ICommandRunner {
  readonly calls: string[][] = [];
  private scripts: Script[] = [];

  on(prefix: string[], ...outcomes: CommandOutcome[]): this {
    this.scripts.push({ prefix, outcomes });
    return this;
  }

  callsMatching(prefix: string[]): string[][] {
    return this.calls.filter((args) => startsWith(args, prefix));
  }

  async run(args: string[]): Promise<CommandOutcome> {
    this.calls.push([...args]);

    let match: Script | undefined;
    for (const script of this.scripts) {
      if (startsWith(args, script.prefix) && (!match || script.prefix.length > match.prefix.length)) {
        match = script;
      }
    }
    if (!match || match.outcomes.length === 0) return ok();

    return match.outcomes.length > 1 ? match.outcomes.shift() ?? ok() : match.outcomes[0];
  }
}

function startsWith(args: string[], prefix: string[]): boolean {
  return prefix.every((part, i) => args[i] === part);
}
