// Clock - injectable source of wall-clock time

/** DI token for the {@link Clock} used by the session engine, ramp and scheduler */
export const CLOCK = Symbol('CLOCK');

export interface Clock {
  /** Current wall-clock time (local weekday and time of day are read from it) */
  now(): Date;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }
}

/** Milliseconds elapsed between two instants, never negative */
export function elapsedMs(since: Date, now: Date): number {
  return Math.max(0, now.getTime() - since.getTime());
}
