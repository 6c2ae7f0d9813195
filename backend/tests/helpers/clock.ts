import type { Clock } from '../../src/types';

export const BASE_TIME = new Date('2026-03-01T12:00:00.000Z');

export const HOUR = 60 * 60 * 1000;

export class FakeClock implements Clock {
  private current: number;

  constructor(start: Date = BASE_TIME) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
