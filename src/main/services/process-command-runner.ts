import { execFile } from 'child_process';
import type { CommandOutcome } from '../../shared/types';
import type { ICommandRunner } from '../interfaces/command-runner';

const SPAWN_FAILED_EXIT_CODE = 127;

export interface ProcessCommandRunnerOptions {
  cwd?: string;
  timeoutMs?: number;
}

export class ProcessCommandRunner implements ICommandRunner {
  constructor(private options: ProcessCommandRunnerOptions = {}) {}

  run(args: string[]): Promise<CommandOutcome> {
    const [program, ...rest] = args;
    if (!program) {
      return Promise.resolve({ exitCode: SPAWN_FAILED_EXIT_CODE, stdout: '', stderr: 'No command given' });
    }

    return new Promise((resolve) => {
      execFile(program, rest, {
        cwd: this.options.cwd,
        timeout: this.options.timeoutMs ?? 60_000,
        maxBuffer: 10 * 1024 * 1024,
        encoding: 'utf-8',
      }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        // Numeric code: the process ran and exited non-zero. String code
        // (ENOENT, EACCES): it never started.
        const exitCode = typeof error.code === 'number' ? error.code
          : typeof error.code === 'string' ? SPAWN_FAILED_EXIT_CODE
          : 1;
        resolve({ exitCode, stdout, stderr: stderr || error.message });
      });
    });
  }
}
