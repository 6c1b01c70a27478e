import type { Clock } from './interfaces.js';

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/**
 * Manually driven clock for tests
 */
export class FixedClock implements Clock {
  private current: Date;

  constructor(start: Date = new Date('2025-01-01T00:00:00.000Z')) {
    this.current = new Date(start.getTime());
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(date: Date): void {
    this.current = new Date(date.getTime());
  }

  advanceSeconds(seconds: number): void {
    this.current = new Date(this.current.getTime() + seconds * 1000);
  }
}
