export type { Clock } from "./clock.js";
export type { TimerService, ScheduledHandle, PointInTimeScheduler } from "./timer.js";
export type { SignalHandler } from "./signal-handler.js";
export type { SensorUpdate, ValueSink } from "./value-sink.js";
