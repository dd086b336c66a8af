export {
  REPRESENTATION_KINDS,
  REPRESENTATION_LABELS,
  isRepresentationKind,
  parseRepresentationKind,
  labelFor,
  iconFor,
  sensorIdFor,
  type RepresentationKind,
  type IconName,
} from "./representation.js";
export { formatRepresentation, formatBeat, beatOf } from "./formatter.js";
export { nextFireInstant, delayToBoundary, type NextFire } from "./alignment.js";
export {
  toLocal,
  toUtc,
  localToInstant,
  startOfNextLocalDay,
  isValidTimeZone,
  type LocalDateTime,
  type WallTime,
} from "./zone.js";
export {
  createRepresentationSensor,
  type RepresentationSensor,
  type SensorOptions,
  type SensorState,
} from "./sensor.js";
export {
  createSensorSet,
  resolveTimeZone,
  snapshotValues,
  type SensorSet,
  type SensorSetOptions,
  type ReconcileResult,
} from "./sensor-set.js";
export { createLogger, createNoopLogger, type Logger, type LogLevel } from "./logger.js";
export {
  CLIError,
  isCLIError,
  isSetupError,
  errorCategory,
  type ErrorCode,
  type ErrorCategory,
} from "./errors/types.js";
export type {
  Clock,
  TimerService,
  ScheduledHandle,
  PointInTimeScheduler,
  SignalHandler,
  SensorUpdate,
  ValueSink,
} from "./ports/index.js";
export {
  systemClock,
  createFixedClock,
  realTimerService,
  createRealScheduler,
  createConsoleSink,
  createMemorySink,
  createProcessSignalHandler,
  createManualClock,
  createManualScheduler,
  type MemorySink,
  type ManualClock,
  type ManualScheduler,
} from "./adapters/index.js";
