import type { IconName, RepresentationKind } from "../representation.js";

export interface SensorUpdate {
  id: string;
  kind: RepresentationKind;
  label: string;
  icon: IconName;
  value: string;
  /** Instant the value was computed from */
  computedAt: number;
}

/**
 * Receives values from sensors.
 * Each sensor publishes sequentially; there is never more than one call in
 * flight for the same id.
 */
export interface ValueSink {
  publish(update: SensorUpdate): void;
  /** Forget the value of a sensor that was disabled or stopped */
  remove(id: string): void;
}
