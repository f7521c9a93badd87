export interface IClock {
  now(): number;
  sleep(seconds: number): Promise<void>;
}
