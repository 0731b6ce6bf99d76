import type { Clock } from '../../src/lib/clock';

/**
 * Clock whose sleep resolves immediately and advances virtual time.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private current: number = Date.parse('2024-06-01T10:00:00.000Z')) {}

  now(): number {
    return this.current;
  }

  sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
    return Promise.resolve();
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(time: number | string): void {
    this.current = typeof time === 'string' ? Date.parse(time) : time;
  }
}
