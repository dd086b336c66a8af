export { systemClock, createFixedClock } from "./system-clock.js";
export { realTimerService, createRealScheduler, MAX_TIMEOUT_MS } from "./real-timers.js";
export { createProcessSignalHandler } from "./process-signals.js";
export {
  createConsoleSink,
  createMemorySink,
  toSensorValueJson,
  type ConsoleSinkOptions,
  type MemorySink,
} from "./console-sink.js";
export {
  createManualClock,
  createManualScheduler,
  type ManualClock,
  type ManualScheduler,
} from "./manual-time.js";
