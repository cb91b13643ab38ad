/**
 * Scheduler Clock
 *
 * Every scheduling decision reads time through a Clock. The clock carries the
 * acceleration factor for the whole run: in normal mode it is 1, in test mode
 * it is 1000, so a nominal one-day deadline resolves in 86.4 seconds and a
 * one-minute step in 60 milliseconds.
 *
 * The factor is fixed when the clock is constructed. Nothing else in the
 * codebase divides durations by it.
 */

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/** Acceleration factor used by `--test` mode. */
export const TEST_ACCELERATION_FACTOR = 1000;

/**
 * Source of the current instant and of due-date arithmetic.
 */
export interface Clock {
  /** How many times faster than real time this clock runs. */
  readonly accelerationFactor: number;

  /** The current instant. */
  now(): Date;

  /**
   * The instant a nominal duration from now resolves to, after acceleration.
   * Always strictly later than `now()`.
   */
  deadline(durationMs: number): Date;
}

function assertAccelerationFactor(factor: number): void {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new RangeError(`Acceleration factor must be a positive number, got ${factor}`);
  }
}

/**
 * Scales a nominal duration by the acceleration factor.
 *
 * Rounds up to whole milliseconds and never returns less than 1 ms, so that a
 * deadline is strictly later than the instant it was computed from.
 */
export function scaleDuration(durationMs: number, accelerationFactor: number): number {
  return Math.max(1, Math.ceil(durationMs / accelerationFactor));
}

/**
 * Clock backed by the system time.
 *
 * @example
 * ```typescript
 * const clock = new SystemClock(TEST_ACCELERATION_FACTOR);
 * clock.deadline(DAY_MS); // ~86.4 seconds from now
 * ```
 */
export class SystemClock implements Clock {
  readonly accelerationFactor: number;

  constructor(accelerationFactor: number = 1) {
    assertAccelerationFactor(accelerationFactor);
    this.accelerationFactor = accelerationFactor;
  }

  now(): Date {
    return new Date();
  }

  deadline(durationMs: number): Date {
    return new Date(this.now().getTime() + scaleDuration(durationMs, this.accelerationFactor));
  }
}

/**
 * Clock frozen at a chosen instant. Tests move it forward explicitly.
 */
export class FixedClock implements Clock {
  readonly accelerationFactor: number;
  private current: number;

  constructor(start: Date, accelerationFactor: number = 1) {
    assertAccelerationFactor(accelerationFactor);
    this.accelerationFactor = accelerationFactor;
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  deadline(durationMs: number): Date {
    return new Date(this.current + scaleDuration(durationMs, this.accelerationFactor));
  }

  /** Moves the clock to the given instant. */
  set(instant: Date): void {
    this.current = instant.getTime();
  }

  /** Moves the clock forward by a real (unscaled) number of milliseconds. */
  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Renders the time left until `nextDue` for listings.
 *
 * Past-due instants render as 'now'. Accelerated clocks show the real
 * remaining seconds or minutes with one decimal, since that is what the
 * tester waits for. Real-time clocks show whole minutes, hours or days.
 */
export function formatTimeUntil(nextDue: Date, clock: Clock): string {
  const remainingMs = nextDue.getTime() - clock.now().getTime();
  if (remainingMs < 0) {
    return 'now';
  }

  const seconds = remainingMs / 1000;
  if (clock.accelerationFactor !== 1) {
    return seconds < 60 ? `${seconds.toFixed(1)}s` : `${(seconds / 60).toFixed(1)}min`;
  }

  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return `${minutes}min`;
  }
  if (minutes < 1440) {
    return `${Math.floor(minutes / 60)}h`;
  }
  return `${Math.floor(minutes / 1440)}d`;
}
