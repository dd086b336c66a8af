/**
 * Abstraction for timer operations.
 * Allows injecting fake timers for testing.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}

/**
 * Opaque, cancelable reference to one scheduled callback.
 */
export interface ScheduledHandle {
  /** Instant the callback is due */
  readonly at: number;
}

/**
 * Runs a callback once at an absolute instant.
 * The callback receives the instant it was scheduled for.
 */
export interface PointInTimeScheduler {
  scheduleAt(at: number, callback: (firedAt: number) => void): ScheduledHandle;
  /** Cancelling twice, or a handle that already fired, is a no-op */
  cancel(handle: ScheduledHandle): void;
}
