import type { Clock } from '../../src/shared/clock';

/** 2024-01-01T00:00:00Z */
export const FAKE_CLOCK_START = Date.UTC(2024, 0, 1);

/**
 * Clock whose `sleep` advances time instantly, so poll loops finish in a single tick.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: number = FAKE_CLOCK_START) {}

  now(): number {
    return this.current;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += ms;
    return Promise.resolve();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
