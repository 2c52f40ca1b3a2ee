import { performance } from 'node:perf_hooks';

/**
 * Millisecond time source. Registry expiry reads time only through this,
 * so tests can move it forward by hand.
 */
export interface Clock {
  now(): number;
}

/**
 * Monotonic clock, unaffected by wall-clock adjustments
 */
export const monotonicClock: Clock = {
  now: () => performance.now(),
};

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
