import type { IClock } from '../interfaces/clock';

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }

  sleep(seconds: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, seconds * 1000));
  }
}
