/** Source of block time, in whole unix seconds. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

export class ManualClock implements Clock {
  private current: number;

  constructor(start: number = 1_700_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    if (seconds < 0) {
      throw new Error('ManualClock cannot move backwards');
    }
    this.current += seconds;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }
}

export const SECONDS_PER_DAY = 86_400;
