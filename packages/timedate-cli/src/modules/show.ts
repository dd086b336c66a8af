import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { loadConfig } from "../lib/config.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type ShowResultJson } from "../lib/json-output.js";
import type { Clock } from "../lib/ports/clock.js";
import { systemClock } from "../lib/adapters/system-clock.js";
import { toSensorValueJson } from "../lib/adapters/console-sink.js";
import {
  REPRESENTATION_KINDS,
  parseRepresentationKind,
  type RepresentationKind,
} from "../lib/representation.js";
import { resolveTimeZone, snapshotValues } from "../lib/sensor-set.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShowOptions {
  timeZone?: string;
  config?: string;
  all?: boolean;
}

export interface ShowDeps {
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Kinds named on the command line, or the configured ones when none are.
 */
export function selectKinds(
  args: string[],
  configured: RepresentationKind[],
  all = false
): RepresentationKind[] {
  if (all) return [...REPRESENTATION_KINDS];
  if (args.length === 0) return configured;
  return args.map(parseRepresentationKind);
}

export function buildShowResult(
  baseId: string,
  kinds: RepresentationKind[],
  timeZone: string | undefined,
  clock: Clock
): ShowResultJson {
  const zone = resolveTimeZone(timeZone);
  const instant = clock.now();

  return {
    timeZone: zone,
    computedAt: new Date(instant).toISOString(),
    sensors: snapshotValues(baseId, kinds, zone, instant).map(toSensorValueJson),
  };
}

export function renderShowTable(result: ShowResultJson): string {
  const table = new CliTable3({
    head: [chalk.cyan("Sensor"), chalk.cyan("Value"), chalk.cyan("Icon")],
  });

  for (const sensor of result.sensors) {
    table.push([sensor.label, sensor.value, chalk.gray(sensor.icon)]);
  }

  return table.toString();
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerShowCommands(program: Command, deps: ShowDeps = {}): void {
  const { clock = systemClock, env = process.env } = deps;

  program
    .command("show")
    .description("Print the current value of each representation once")
    .argument("[kinds...]", "Representations to show (default: configured display options)")
    .option("-z, --time-zone <zone>", "IANA time zone, e.g. Europe/Berlin")
    .option("-a, --all", "Show every representation")
    .option("-c, --config <path>", "Path to configuration file")
    .action((kindArgs: string[], options: ShowOptions) => {
      try {
        const { config } = loadConfig(options.config, { timeZone: options.timeZone }, env);
        const kinds = selectKinds(kindArgs, config.displayOptions, options.all);
        const result = buildShowResult(config.baseId, kinds, config.timeZone, clock);

        if (maybeOutputJson(result)) return;

        console.log(chalk.gray(`Time zone: ${result.timeZone}`));
        console.log(renderShowTable(result));
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });
}
