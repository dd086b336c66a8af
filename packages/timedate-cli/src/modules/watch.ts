import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "../lib/config.js";
import { isJsonMode, isQuietMode } from "../lib/cli-context.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { outputNdjson, type WatchEventJson } from "../lib/json-output.js";
import type { Clock } from "../lib/ports/clock.js";
import type { PointInTimeScheduler } from "../lib/ports/timer.js";
import type { SignalHandler } from "../lib/ports/signal-handler.js";
import type { ValueSink } from "../lib/ports/value-sink.js";
import { systemClock } from "../lib/adapters/system-clock.js";
import { createRealScheduler } from "../lib/adapters/real-timers.js";
import { createProcessSignalHandler } from "../lib/adapters/process-signals.js";
import { createConsoleSink } from "../lib/adapters/console-sink.js";
import { createSensorSet, type ReconcileResult, type SensorSet } from "../lib/sensor-set.js";
import { selectKinds } from "./show.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WatchOptions {
  timeZone?: string;
  config?: string;
}

/**
 * Dependencies for watch operations.
 * All have defaults for production use.
 */
export interface WatchDeps {
  clock?: Clock;
  scheduler?: PointInTimeScheduler;
  signalHandler?: SignalHandler;
  sink?: ValueSink;
  logger?: Logger;
  emit?: (event: WatchEventJson) => void;
  env?: NodeJS.ProcessEnv;
  json?: boolean;
}

export interface WatchSession {
  sensorSet: SensorSet;
  logger: Logger;
  /** Re-read the configuration and reconcile the enabled kinds */
  reload(): ReconcileResult | undefined;
  /** Stop every sensor; safe to call more than once */
  shutdown(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Core Watch Logic
// ---------------------------------------------------------------------------

/**
 * Start a sensor set for the requested kinds and wire it to the process.
 *
 * Kinds named on the command line are fixed for the session; otherwise a
 * reload picks up the display options from the configuration again.
 */
export function startWatch(
  kindArgs: string[],
  options: WatchOptions,
  deps: WatchDeps = {}
): WatchSession {
  const {
    clock = systemClock,
    env = process.env,
    emit = outputNdjson,
    json = isJsonMode(),
  } = deps;

  const cliOverrides = { timeZone: options.timeZone };
  const { config, sources } = loadConfig(options.config, cliOverrides, env);
  const kinds = selectKinds(kindArgs, config.displayOptions);
  const kindsFixed = kindArgs.length > 0;

  const logger =
    deps.logger ??
    createLogger({
      level: isQuietMode() ? "warn" : config.logLevel,
      json: config.logJson || json,
      clock,
      stderrOnly: json,
    });

  if (sources.length > 0) {
    logger.info("Loaded configuration", { sources });
  }

  const sensorSet = createSensorSet({
    baseId: config.baseId,
    timeZone: config.timeZone,
    kinds,
    clock,
    scheduler: deps.scheduler ?? createRealScheduler(clock),
    sink: deps.sink ?? createConsoleSink({ json, emit, clock }),
    logger,
  });

  const signalHandler = deps.signalHandler ?? createProcessSignalHandler();
  const timestamp = () => clock.newDate().toISOString();
  let isShuttingDown = false;

  const reload = (): ReconcileResult | undefined => {
    if (isShuttingDown) return undefined;

    const { config: next } = loadConfig(options.config, cliOverrides, env);
    if (next.timeZone !== undefined && next.timeZone !== sensorSet.timeZone) {
      logger.warn("Time zone changes take effect after a restart", {
        current: sensorSet.timeZone,
        configured: next.timeZone,
      });
    }
    if (kindsFixed) {
      logger.info("Representations were given on the command line, keeping them");
      return { added: [], removed: [] };
    }

    const result = sensorSet.reconcile(next.displayOptions);
    if (json) {
      emit({
        type: "reload",
        timestamp: timestamp(),
        data: { kinds: sensorSet.sensors().map((s) => s.kind) },
      });
    }
    return result;
  };

  const shutdown = async (): Promise<void> => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info("Shutting down...");
    sensorSet.stop();
    signalHandler.removeAll();

    if (json) {
      emit({ type: "stop", timestamp: timestamp() });
    }
    logger.info("Shutdown complete");
  };

  signalHandler.onShutdown(shutdown);
  signalHandler.onReload(() => {
    try {
      reload();
    } catch (error) {
      logger.error("Reload failed, keeping the current representations", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });

  if (json) {
    emit({
      type: "start",
      timestamp: timestamp(),
      data: {
        timeZone: sensorSet.timeZone,
        kinds: sensorSet.sensors().map((s) => s.kind),
      },
    });
  }

  sensorSet.start();

  return { sensorSet, logger, reload, shutdown };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerWatchCommands(program: Command, deps: WatchDeps = {}): void {
  program
    .command("watch")
    .description("Publish representations continuously, each at its own boundary")
    .argument("[kinds...]", "Representations to publish (default: configured display options)")
    .option("-z, --time-zone <zone>", "IANA time zone, e.g. Europe/Berlin")
    .option("-c, --config <path>", "Path to configuration file")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Update Cadence:")}
  date                 at local midnight
  beat                 every 86.4 seconds (one beat)
  everything else      at the start of every minute

${chalk.bold.cyan("Signals:")}
  ${chalk.yellow("Ctrl+C")} / SIGTERM   stop, cancelling every timer
  SIGHUP               reload the config file and apply displayOptions

${chalk.bold.cyan("Examples:")}
  timedate watch --time-zone Europe/Berlin
      ${chalk.gray("Publish the configured representations")}

  timedate watch time beat date --time-zone UTC
      ${chalk.gray("Publish three representations")}

  timedate watch --json
      ${chalk.gray("Stream NDJSON events on stdout; logs go to stderr")}
`
    )
    .action((kindArgs: string[], options: WatchOptions) => {
      try {
        const session = startWatch(kindArgs, options, deps);
        session.logger.info("Watch mode started. Press Ctrl+C to stop.");
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
