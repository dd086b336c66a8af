import { sinkRemoveFailed, timeZoneInvalid, timeZoneMissing } from "./errors/catalog.js";
import { formatRepresentation } from "./formatter.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { PointInTimeScheduler } from "./ports/timer.js";
import type { SensorUpdate, ValueSink } from "./ports/value-sink.js";
import {
  iconFor,
  labelFor,
  orderKinds,
  sensorIdFor,
  type RepresentationKind,
} from "./representation.js";
import { createRepresentationSensor, type RepresentationSensor } from "./sensor.js";
import { isValidTimeZone } from "./zone.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SensorSetOptions {
  /** Prefix of every sensor id */
  baseId: string;
  timeZone: string | undefined;
  kinds: Iterable<RepresentationKind>;
  clock: Clock;
  scheduler: PointInTimeScheduler;
  sink: ValueSink;
  logger?: Logger;
}

export interface ReconcileResult {
  added: RepresentationKind[];
  removed: RepresentationKind[];
}

export interface SensorSet {
  readonly timeZone: string;
  readonly running: boolean;
  /** Sensors in catalog order */
  sensors(): RepresentationSensor[];
  get(kind: RepresentationKind): RepresentationSensor | undefined;
  /** Activate every sensor */
  start(): void;
  /** Bring the set in line with a new list of enabled kinds */
  reconcile(kinds: Iterable<RepresentationKind>): ReconcileResult;
  /** Deactivate every sensor and withdraw its value */
  stop(): void;
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

/**
 * Validate the configured zone. Failing here aborts the whole set before
 * any sensor exists.
 */
export function resolveTimeZone(timeZone: string | undefined): string {
  if (timeZone === undefined || timeZone.trim() === "") {
    throw timeZoneMissing();
  }
  const trimmed = timeZone.trim();
  if (!isValidTimeZone(trimmed)) {
    throw timeZoneInvalid(trimmed);
  }
  return trimmed;
}

/**
 * Current values of several kinds, all computed from one instant.
 */
export function snapshotValues(
  baseId: string,
  kinds: Iterable<RepresentationKind>,
  timeZone: string,
  instant: number
): SensorUpdate[] {
  return orderKinds(kinds).map((kind) => ({
    id: sensorIdFor(baseId, kind),
    kind,
    label: labelFor(kind),
    icon: iconFor(kind),
    value: formatRepresentation(instant, kind, timeZone),
    computedAt: instant,
  }));
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createSensorSet(options: SensorSetOptions): SensorSet {
  const timeZone = resolveTimeZone(options.timeZone);
  const { baseId, clock, scheduler, sink } = options;
  const logger = options.logger ?? createNoopLogger();

  const sensors = new Map<RepresentationKind, RepresentationSensor>();
  let running = false;

  function add(kind: RepresentationKind): RepresentationSensor {
    const sensor = createRepresentationSensor({
      id: sensorIdFor(baseId, kind),
      kind,
      timeZone,
      clock,
      scheduler,
      sink,
      logger,
    });
    sensors.set(kind, sensor);
    return sensor;
  }

  function ordered(): RepresentationSensor[] {
    return orderKinds(sensors.keys()).flatMap((kind) => {
      const sensor = sensors.get(kind);
      return sensor ? [sensor] : [];
    });
  }

  /**
   * Deactivate every sensor first so a failing sink can't leave a timer
   * armed, then withdraw each value on its own.
   */
  function retire(retired: RepresentationSensor[]): void {
    for (const sensor of retired) {
      sensor.deactivate();
    }
    for (const sensor of retired) {
      try {
        sink.remove(sensor.id);
      } catch (cause) {
        const error = sinkRemoveFailed(sensor.id, cause);
        logger.error(error.message, {
          code: error.code,
          sensor: sensor.id,
          details: error.details,
        });
      }
    }
  }

  for (const kind of orderKinds(options.kinds)) {
    add(kind);
  }

  return {
    timeZone,

    get running() {
      return running;
    },

    sensors() {
      return ordered();
    },

    get(kind) {
      return sensors.get(kind);
    },

    start() {
      if (running) return;
      running = true;
      logger.info("Starting sensors", {
        timeZone,
        kinds: orderKinds(sensors.keys()),
      });
      for (const sensor of ordered()) {
        sensor.activate();
      }
    },

    reconcile(kinds) {
      const wanted = orderKinds(kinds);
      const added = wanted.filter((kind) => !sensors.has(kind));
      const removed = orderKinds(sensors.keys()).filter((kind) => !wanted.includes(kind));

      const retired = removed.flatMap((kind) => {
        const sensor = sensors.get(kind);
        sensors.delete(kind);
        return sensor ? [sensor] : [];
      });
      if (running) {
        retire(retired);
      }

      for (const kind of added) {
        const sensor = add(kind);
        if (running) {
          sensor.activate();
        }
      }

      if (added.length > 0 || removed.length > 0) {
        logger.info("Enabled representations changed", { added, removed });
      }

      return { added, removed };
    },

    stop() {
      if (!running) return;
      running = false;
      retire(ordered());
      logger.info("Sensors stopped");
    },
  };
}
