import type { Clock } from "../ports/clock.js";
import type { PointInTimeScheduler, ScheduledHandle } from "../ports/timer.js";

/**
 * Clock that only moves when told to.
 */
export interface ManualClock extends Clock {
  set(instant: number): void;
  advance(ms: number): void;
}

/**
 * Scheduler whose callbacks run only when time is advanced explicitly.
 * Used to drive sensors deterministically in tests and simulations.
 */
export interface ManualScheduler extends PointInTimeScheduler {
  /** Outstanding handles, earliest first */
  readonly pending: ScheduledHandle[];
  /** Run the earliest callback, moving the clock up to it. Returns its instant. */
  fireNext(): number | undefined;
  /** Run every callback due at or before `instant`, in order. Returns how many ran. */
  advanceTo(instant: number): number;
}

export function createManualClock(start: number): ManualClock {
  let current = start;
  return {
    now: () => current,
    newDate: () => new Date(current),
    set(instant) {
      current = instant;
    },
    advance(ms) {
      current += ms;
    },
  };
}

export function createManualScheduler(clock: ManualClock): ManualScheduler {
  const entries: Array<{ handle: ScheduledHandle; callback: (firedAt: number) => void }> = [];

  function earliestIndex(): number {
    let index = -1;
    for (let i = 0; i < entries.length; i++) {
      if (index === -1 || entries[i].handle.at < entries[index].handle.at) {
        index = i;
      }
    }
    return index;
  }

  function fireNext(): number | undefined {
    const index = earliestIndex();
    if (index === -1) return undefined;

    const [entry] = entries.splice(index, 1);
    if (clock.now() < entry.handle.at) {
      clock.set(entry.handle.at);
    }
    entry.callback(entry.handle.at);
    return entry.handle.at;
  }

  return {
    get pending() {
      return entries.map((e) => e.handle).sort((a, b) => a.at - b.at);
    },

    scheduleAt(at, callback) {
      if (!Number.isFinite(at)) {
        throw new RangeError(`Cannot schedule a callback at ${String(at)}`);
      }
      const handle: ScheduledHandle = { at };
      entries.push({ handle, callback });
      return handle;
    },

    cancel(handle) {
      const index = entries.findIndex((e) => e.handle === handle);
      if (index !== -1) {
        entries.splice(index, 1);
      }
    },

    fireNext,

    advanceTo(instant) {
      let fired = 0;
      for (;;) {
        const index = earliestIndex();
        if (index === -1 || entries[index].handle.at > instant) break;
        fireNext();
        fired++;
      }
      if (clock.now() < instant) {
        clock.set(instant);
      }
      return fired;
    },
  };
}
