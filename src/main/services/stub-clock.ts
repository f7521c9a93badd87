import type { IClock } from '../interfaces/clock';

/** Virtual clock: `sleep` resolves immediately and advances `now`. */
export class StubClock implements IClock {
  readonly sleeps: number[] = [];

  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  async sleep(seconds: number): Promise<void> {
    this.sleeps.push(seconds);
    this.current += seconds * 1000;
  }
}
