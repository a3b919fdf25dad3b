/**
 * Source of "now" for everything that reads the time.
 * Values are absolute milliseconds since the Unix epoch.
 */
export interface Clock {
  now(): number;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }
}

/**
 * Clock whose time only moves through `set` and `advance`.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(millis: number): void {
    this.current = millis;
  }

  advance(millis: number): void {
    this.current += millis;
  }
}
