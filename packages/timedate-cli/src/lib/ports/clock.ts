/**
 * Abstraction for reading the current instant.
 * Allows injecting fake clocks for testing.
 */
export interface Clock {
  /** Current instant in epoch milliseconds */
  now(): number;
  /** Create a Date for the current instant */
  newDate(): Date;
}
