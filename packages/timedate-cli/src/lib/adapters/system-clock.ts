import type { Clock } from "../ports/clock.js";

/**
 * Real system clock implementation.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
  newDate: () => new Date(),
};

/**
 * Clock pinned to an instant, for one-shot rendering and tests.
 */
export function createFixedClock(instant: number): Clock {
  return {
    now: () => instant,
    newDate: () => new Date(instant),
  };
}
