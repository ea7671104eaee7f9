/**
 * Time source shared by the monitor, the distributor and the cycle manager.
 *
 * All times are epoch milliseconds. The simulation clock and the wall clock
 * are the same thing unless a caller injects its own.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)),
};

/**
 * Clock that only moves when told to. `sleep` advances time immediately,
 * so poll loops run to completion without real waiting.
 */
export class ManualClock implements Clock {
  private current: number;
  readonly sleeps: number[] = [];

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
  }
}
