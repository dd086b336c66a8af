import type { Clock } from "../ports/clock.js";
import type { PointInTimeScheduler, ScheduledHandle, TimerService } from "../ports/timer.js";
import { systemClock } from "./system-clock.js";

/** Largest delay setTimeout accepts without overflowing to 1 ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Real timer service using global setTimeout/clearTimeout.
 */
export const realTimerService: TimerService = {
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};

/**
 * Point-in-time scheduler on top of a timer service.
 *
 * Delays past MAX_TIMEOUT_MS are chained behind the same handle, and a
 * timeout that wakes before its instant is re-armed for the remainder.
 */
export function createRealScheduler(
  clock: Clock = systemClock,
  timers: TimerService = realTimerService
): PointInTimeScheduler {
  const pending = new Map<ScheduledHandle, { timeout?: NodeJS.Timeout }>();

  return {
    scheduleAt(at, callback) {
      if (!Number.isFinite(at)) {
        throw new RangeError(`Cannot schedule a callback at ${String(at)}`);
      }

      const handle: ScheduledHandle = { at };
      const state: { timeout?: NodeJS.Timeout } = {};

      const arm = (): void => {
        const remaining = at - clock.now();
        if (remaining > MAX_TIMEOUT_MS) {
          state.timeout = timers.setTimeout(arm, MAX_TIMEOUT_MS);
          return;
        }
        state.timeout = timers.setTimeout(() => {
          if (clock.now() < at) {
            arm();
            return;
          }
          pending.delete(handle);
          callback(at);
        }, Math.max(0, remaining));
      };

      arm();
      pending.set(handle, state);
      return handle;
    },

    cancel(handle) {
      const state = pending.get(handle);
      if (!state) return;
      if (state.timeout) {
        timers.clearTimeout(state.timeout);
      }
      pending.delete(handle);
    },
  };
}
