/**
 * Injectable time source.
 *
 * Components never call `new Date()` for business time; they read the
 * clock they were given, so tests can pin and advance time.
 */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Manually driven clock for tests and replays.
 */
export class ManualClock implements Clock {
  private _current: number;

  constructor(start: Date | string = new Date(0)) {
    this._current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this._current);
  }

  set(time: Date | string): void {
    this._current = new Date(time).getTime();
  }

  advance(ms: number): void {
    this._current += ms;
  }

  advanceDays(days: number): void {
    this.advance(days * DAY_MS);
  }
}
