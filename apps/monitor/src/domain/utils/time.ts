/**
 * Time provider abstraction for testable time-dependent code.
 * Every reliability component receives its clock explicitly; there is no global one.
 */

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export interface TimeProvider {
  /** Get current timestamp in milliseconds */
  now(): number;
}

/**
 * Default time provider using system clock.
 */
export class SystemTimeProvider implements TimeProvider {
  now(): number {
    return Date.now();
  }
}

/**
 * Mock time provider for testing.
 * Allows controlling time in unit tests.
 */
export class MockTimeProvider implements TimeProvider {
  private currentTime: number;

  constructor(initialTime: number = 0) {
    this.currentTime = initialTime;
  }

  now(): number {
    return this.currentTime;
  }

  /** Advance time by specified milliseconds */
  advanceBy(ms: number): void {
    this.currentTime += ms;
  }

  /** Set time to specific value */
  setTime(time: number): void {
    this.currentTime = time;
  }
}

/**
 * Start of the UTC hour containing `timestamp`.
 *
 * @example
 * hourStart(Date.UTC(2024, 0, 15, 10, 42)) // Date.UTC(2024, 0, 15, 10)
 */
export function hourStart(timestamp: number): number {
  return Math.floor(timestamp / HOUR_MS) * HOUR_MS;
}

