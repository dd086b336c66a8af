import chalk from "chalk";
import type { Clock } from "../ports/clock.js";
import type { SensorUpdate, ValueSink } from "../ports/value-sink.js";
import { systemClock } from "./system-clock.js";
import { outputNdjson, type SensorValueJson, type WatchEventJson } from "../json-output.js";

export interface ConsoleSinkOptions {
  json: boolean;
  /** Line writer for text mode */
  write?: (line: string) => void;
  /** Event writer for JSON mode */
  emit?: (event: WatchEventJson) => void;
  /** Timestamps remove events */
  clock?: Clock;
}

export function toSensorValueJson(update: SensorUpdate): SensorValueJson {
  return {
    id: update.id,
    kind: update.kind,
    label: update.label,
    icon: update.icon,
    value: update.value,
  };
}

/**
 * Sink that prints every update, as text lines or NDJSON events.
 */
export function createConsoleSink(options: ConsoleSinkOptions): ValueSink {
  const write = options.write ?? ((line: string) => console.log(line));
  const emit = options.emit ?? outputNdjson;
  const clock = options.clock ?? systemClock;

  return {
    publish(update) {
      if (options.json) {
        emit({
          type: "update",
          timestamp: new Date(update.computedAt).toISOString(),
          data: { sensor: toSensorValueJson(update) },
        });
        return;
      }
      write(`${chalk.cyan(update.label)}: ${update.value}`);
    },

    remove(id) {
      if (options.json) {
        emit({ type: "remove", timestamp: clock.newDate().toISOString(), data: { id } });
        return;
      }
      write(chalk.gray(`${id} removed`));
    },
  };
}

/**
 * Sink that keeps the latest value per sensor id.
 */
export interface MemorySink extends ValueSink {
  get(id: string): SensorUpdate | undefined;
  values(): SensorUpdate[];
}

export function createMemorySink(): MemorySink {
  const latest = new Map<string, SensorUpdate>();

  return {
    publish(update) {
      latest.set(update.id, update);
    },
    remove(id) {
      latest.delete(id);
    },
    get(id) {
      return latest.get(id);
    },
    values() {
      return [...latest.values()];
    },
  };
}
