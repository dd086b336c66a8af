import { nextFireInstant } from "./alignment.js";
import { sinkPublishFailed, timerArmFailed } from "./errors/catalog.js";
import type { CLIError } from "./errors/types.js";
import { formatRepresentation } from "./formatter.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { PointInTimeScheduler, ScheduledHandle } from "./ports/timer.js";
import type { ValueSink } from "./ports/value-sink.js";
import {
  iconFor,
  labelFor,
  type IconName,
  type RepresentationKind,
} from "./representation.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * idle: no timer armed; armed: waiting for the next boundary;
 * firing: formatting and publishing an update.
 */
export type SensorState = "idle" | "armed" | "firing";

export interface SensorOptions {
  id: string;
  kind: RepresentationKind;
  timeZone: string;
  clock: Clock;
  scheduler: PointInTimeScheduler;
  sink: ValueSink;
  logger?: Logger;
}

export interface RepresentationSensor {
  readonly id: string;
  readonly kind: RepresentationKind;
  readonly label: string;
  readonly icon: IconName;
  readonly state: SensorState;
  /** Last computed value */
  readonly value: string;
  /** Instant the current value was computed from */
  readonly computedAt: number;
  /** Instant of the armed timer, if any */
  readonly nextFireAt: number | undefined;
  /** Publish a fresh value and arm the first timer */
  activate(): void;
  /** Cancel the pending timer; safe to call any number of times */
  deactivate(): void;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

const iso = (instant: number): string => new Date(instant).toISOString();

/**
 * Create a sensor that republishes one representation at each of its
 * boundaries until deactivated.
 *
 * At most one timer is outstanding, and the next one is armed only after
 * the previous fire has published. Every activation starts a new
 * generation; callbacks from an older generation are dropped.
 */
export function createRepresentationSensor(options: SensorOptions): RepresentationSensor {
  const { id, kind, timeZone, clock, scheduler, sink } = options;
  const logger = (options.logger ?? createNoopLogger()).child({ sensor: id, kind });
  const label = labelFor(kind);
  const icon = iconFor(kind);

  let state: SensorState = "idle";
  let handle: ScheduledHandle | undefined;
  let generation = 0;
  let computedAt = clock.now();
  let value = formatRepresentation(computedAt, kind, timeZone);

  function logFailure(error: CLIError): void {
    logger.error(error.message, {
      code: error.code,
      details: error.details,
      suggestion: error.suggestion,
    });
  }

  function compute(instant: number): void {
    computedAt = instant;
    value = formatRepresentation(instant, kind, timeZone);
  }

  function publish(): boolean {
    try {
      sink.publish({ id, kind, label, icon, value, computedAt });
      return true;
    } catch (error) {
      state = "idle";
      logFailure(sinkPublishFailed(id, error));
      return false;
    }
  }

  function arm(from: number, token: number): void {
    try {
      const next = nextFireInstant(from, kind, timeZone);
      logger.debug("Scheduling next update", {
        now: iso(from),
        delta: next.delta,
        next: iso(next.at),
      });
      handle = scheduler.scheduleAt(next.at, (firedAt) => onFire(firedAt, token));
      state = "armed";
    } catch (error) {
      handle = undefined;
      state = "idle";
      logFailure(timerArmFailed(id, error));
    }
  }

  function onFire(firedAt: number, token: number): void {
    if (token !== generation || state !== "armed") {
      logger.debug("Dropping callback from a cancelled timer", { firedAt: iso(firedAt) });
      return;
    }

    handle = undefined;
    state = "firing";
    compute(Math.max(firedAt, clock.now()));

    if (!publish()) return;
    // The sink may have deactivated this sensor while publishing.
    if (token !== generation) return;

    arm(computedAt, token);
  }

  return {
    id,
    kind,
    label,
    icon,

    get state() {
      return state;
    },

    get value() {
      return value;
    },

    get computedAt() {
      return computedAt;
    },

    get nextFireAt() {
      return handle?.at;
    },

    activate() {
      if (state !== "idle") {
        logger.debug("Sensor already active");
        return;
      }

      generation += 1;
      const token = generation;
      compute(clock.now());
      state = "firing";

      if (!publish()) return;
      if (token !== generation) return;

      arm(computedAt, token);
    },

    deactivate() {
      generation += 1;
      if (handle) {
        scheduler.cancel(handle);
        handle = undefined;
      }
      if (state !== "idle") {
        logger.debug("Sensor deactivated");
      }
      state = "idle";
    },
  };
}
