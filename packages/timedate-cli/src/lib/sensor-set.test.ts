import { describe, it, expect, vi, beforeEach } from "vitest";
import { createSensorSet, resolveTimeZone, snapshotValues, type SensorSetOptions } from "./sensor-set.js";
import {
  createManualClock,
  createManualScheduler,
  type ManualClock,
  type ManualScheduler,
} from "./adapters/manual-time.js";
import { createMemorySink, type MemorySink } from "./adapters/console-sink.js";
import { CLIError, isSetupError } from "./errors/types.js";
import type { Logger } from "./logger.js";
import type { ValueSink } from "./ports/value-sink.js";

const at = (iso: string): number => Date.parse(iso);

const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

const createMockLogger = (): Logger => {
  const logger: Logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => logger),
  };
  return logger;
};

describe("resolveTimeZone", () => {
  it("trims a valid zone", () => {
    expect(resolveTimeZone(" Europe/Berlin ")).toBe("Europe/Berlin");
  });

  it("rejects a missing zone", () => {
    expect(() => resolveTimeZone(undefined)).toThrow(CLIError);
    expect(() => resolveTimeZone("   ")).toThrow("No time zone is configured");
  });

  it("rejects an unknown zone", () => {
    expect(() => resolveTimeZone("Mars/Base")).toThrow('Unknown time zone "Mars/Base"');
  });

  it("reports both failures as setup errors", () => {
    expect(isSetupError(thrownBy(() => resolveTimeZone(undefined)))).toBe(true);
    expect(isSetupError(thrownBy(() => resolveTimeZone("Mars/Base")))).toBe(true);
  });
});

describe("snapshotValues", () => {
  it("computes every kind from one instant in catalog order", () => {
    const instant = at("2024-07-15T10:05:30Z");
    const values = snapshotValues("home", ["time_utc", "time"], "Europe/Berlin", instant);

    expect(values).toEqual([
      {
        id: "home_time",
        kind: "time",
        label: "Time",
        icon: "mdi:clock",
        value: "12:05",
        computedAt: instant,
      },
      {
        id: "home_time_utc",
        kind: "time_utc",
        label: "Time (UTC)",
        icon: "mdi:clock",
        value: "10:05",
        computedAt: instant,
      },
    ]);
  });
});

describe("createSensorSet", () => {
  let clock: ManualClock;
  let scheduler: ManualScheduler;
  let sink: MemorySink;
  let logger: Logger;

  const options = (overrides: Partial<SensorSetOptions> = {}): SensorSetOptions => ({
    baseId: "timedate",
    timeZone: "Europe/Berlin",
    kinds: ["time", "beat"],
    clock,
    scheduler,
    sink,
    logger,
    ...overrides,
  });

  beforeEach(() => {
    clock = createManualClock(at("2024-07-15T10:05:30Z"));
    scheduler = createManualScheduler(clock);
    sink = createMemorySink();
    logger = createMockLogger();
  });

  describe("setup", () => {
    it("fails before creating sensors when the zone is missing", () => {
      expect(thrownBy(() => createSensorSet(options({ timeZone: undefined })))).toMatchObject({
        code: "SETUP_TIME_ZONE_MISSING",
      });
      expect(scheduler.pending).toEqual([]);
    });

    it("fails when the zone is unknown", () => {
      expect(
        thrownBy(() => createSensorSet(options({ timeZone: "Nowhere/Special" })))
      ).toMatchObject({ code: "SETUP_TIME_ZONE_INVALID" });
    });

    it("creates one sensor per distinct kind", () => {
      const set = createSensorSet(options({ kinds: ["beat", "time", "beat"] }));

      expect(set.sensors().map((s) => s.id)).toEqual(["timedate_time", "timedate_beat"]);
      expect(set.running).toBe(false);
    });

    it("allows an empty set", () => {
      const set = createSensorSet(options({ kinds: [] }));
      set.start();

      expect(set.sensors()).toEqual([]);
      expect(scheduler.pending).toEqual([]);
    });
  });

  describe("start", () => {
    it("publishes every sensor and arms one timer each", () => {
      const set = createSensorSet(options());
      set.start();

      expect(sink.get("timedate_time")?.value).toBe("12:05");
      expect(sink.get("timedate_beat")?.value).toBe("@462");
      expect(scheduler.pending).toEqual([
        { at: at("2024-07-15T10:06:00Z") },
        { at: at("2024-07-15T10:06:43.200Z") },
      ]);
      expect(set.running).toBe(true);
    });

    it("is idempotent", () => {
      const set = createSensorSet(options());
      set.start();
      set.start();

      expect(scheduler.pending).toHaveLength(2);
    });

    it("schedules siblings independently", () => {
      const set = createSensorSet(options({ kinds: ["time", "date"] }));
      set.start();
      scheduler.advanceTo(at("2024-07-15T10:10:00Z"));

      expect(sink.get("timedate_time")?.value).toBe("12:10");
      expect(sink.get("timedate_date")?.value).toBe("2024-07-15");
      expect(set.get("date")?.nextFireAt).toBe(at("2024-07-15T22:00:00Z"));
    });
  });

  describe("reconcile", () => {
    it("adds and removes sensors while running", () => {
      const set = createSensorSet(options());
      set.start();

      const result = set.reconcile(["time", "date_time_iso"]);

      expect(result).toEqual({ added: ["date_time_iso"], removed: ["beat"] });
      expect(set.sensors().map((s) => s.kind)).toEqual(["time", "date_time_iso"]);
      expect(sink.get("timedate_beat")).toBeUndefined();
      expect(sink.get("timedate_date_time_iso")?.value).toBe("2024-07-15T12:05:00");
      expect(scheduler.pending).toHaveLength(2);
      expect(logger.info).toHaveBeenCalledWith("Enabled representations changed", {
        added: ["date_time_iso"],
        removed: ["beat"],
      });
    });

    it("leaves unchanged sensors alone", () => {
      const set = createSensorSet(options());
      set.start();
      const time = set.get("time");

      set.reconcile(["beat", "time"]);

      expect(set.get("time")).toBe(time);
      expect(scheduler.pending).toHaveLength(2);
    });

    it("disarms every dropped sensor when withdrawing values fails", () => {
      const failing: ValueSink = {
        publish: vi.fn(),
        remove: vi.fn(() => {
          throw new Error("display closed");
        }),
      };
      const set = createSensorSet(options({ kinds: ["time", "date", "beat"], sink: failing }));
      set.start();

      const result = set.reconcile(["time"]);

      expect(result).toEqual({ added: [], removed: ["date", "beat"] });
      expect(scheduler.pending).toEqual([{ at: at("2024-07-15T10:06:00Z") }]);
      expect(set.sensors().map((s) => s.kind)).toEqual(["time"]);
      expect(logger.error).toHaveBeenCalledTimes(2);
    });

    it("does not activate sensors before start", () => {
      const set = createSensorSet(options());
      set.reconcile(["date"]);

      expect(set.sensors().map((s) => s.kind)).toEqual(["date"]);
      expect(sink.values()).toEqual([]);
      expect(scheduler.pending).toEqual([]);
    });
  });

  describe("stop", () => {
    it("cancels every timer and withdraws every value", () => {
      const remove = vi.fn();
      const recording: ValueSink = { publish: vi.fn(), remove };
      const set = createSensorSet(options({ sink: recording }));
      set.start();
      set.stop();

      expect(scheduler.pending).toEqual([]);
      expect(remove.mock.calls).toEqual([["timedate_time"], ["timedate_beat"]]);
      expect(set.sensors().every((s) => s.state === "idle")).toBe(true);
      expect(set.running).toBe(false);
    });

    it("can be called more than once", () => {
      const remove = vi.fn();
      const set = createSensorSet(options({ sink: { publish: vi.fn(), remove } }));
      set.start();
      set.stop();
      set.stop();

      expect(remove).toHaveBeenCalledTimes(2);
    });

    it("cancels every timer even when withdrawing values fails", () => {
      const failing: ValueSink = {
        publish: vi.fn(),
        remove: vi.fn(() => {
          throw new Error("display closed");
        }),
      };
      const set = createSensorSet(options({ kinds: ["time", "date", "beat"], sink: failing }));
      set.start();
      expect(scheduler.pending).toHaveLength(3);

      set.stop();

      expect(scheduler.pending).toEqual([]);
      expect(set.running).toBe(false);
      expect(failing.remove).toHaveBeenCalledTimes(3);
      expect(logger.error).toHaveBeenCalledTimes(3);
      expect(logger.error).toHaveBeenCalledWith("Couldn't withdraw the value of timedate_date", {
        code: "SINK_REMOVE_FAILED",
        sensor: "timedate_date",
        details: "display closed",
      });
    });

    it("does nothing before start", () => {
      const remove = vi.fn();
      const set = createSensorSet(options({ sink: { publish: vi.fn(), remove } }));
      set.stop();

      expect(remove).not.toHaveBeenCalled();
    });
  });
});
