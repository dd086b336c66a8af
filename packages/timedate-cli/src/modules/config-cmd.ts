import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { stringify as stringifyYaml } from "yaml";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { timeZoneInvalid } from "../lib/errors/catalog.js";
import { renderUnknownError } from "../lib/errors/renderer.js";
import { isCLIError } from "../lib/errors/types.js";
import { maybeOutputJson } from "../lib/json-output.js";
import { isValidTimeZone } from "../lib/zone.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConfigCheck {
  path: string;
  status: "valid" | "invalid" | "missing";
  error?: string;
}

interface InitOptions {
  global?: boolean;
  timeZone?: string;
  force?: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Commented starter file. The zone line is left commented out unless one
 * is given, since there is no sensible default.
 */
export function renderExampleConfig(timeZone?: string): string {
  const zoneLine = timeZone ? `timeZone: ${timeZone}` : "# timeZone: Europe/Berlin";

  return `# timedate configuration
#
# Lookup order, later wins:
#   ${SYSTEM_CONFIG_PATH}
#   ~/.config/timedate/config.yaml
#   TIMEDATE_TIME_ZONE / TIMEDATE_LOG_LEVEL
#   command-line flags

# IANA time zone for local representations (required)
${zoneLine}

# Published by \`timedate watch\` and printed by \`timedate show\`.
# One of: time, date, date_time, date_time_utc, date_time_iso,
#         time_date, beat, time_utc
displayOptions:
  - time

# Sensor ids are <baseId>_<kind>
baseId: timedate

logging:
  # debug, info, warn or error
  level: info
  # One JSON object per line, for journald and log shippers
  json: false
`;
}

function describeError(error: unknown): string {
  if (isCLIError(error) && error.details) {
    return `${error.message}\n${error.details}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse each file without merging. Missing files only count against an
 * explicitly named path.
 */
export function checkConfigFiles(paths: string[]): ConfigCheck[] {
  return paths.map((path): ConfigCheck => {
    if (!existsSync(path)) {
      return { path, status: "missing" };
    }
    try {
      loadConfigFile(path);
      return { path, status: "valid" };
    } catch (error) {
      return { path, status: "invalid", error: describeError(error) };
    }
  });
}

/**
 * Resolved settings laid out the way the config file spells them.
 */
export function toConfigDocument(resolved: ResolvedConfig): Record<string, unknown> {
  return {
    ...(resolved.timeZone !== undefined && { timeZone: resolved.timeZone }),
    displayOptions: resolved.displayOptions,
    baseId: resolved.baseId,
    logging: { level: resolved.logLevel, json: resolved.logJson },
  };
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Create, check and inspect configuration files");

  config
    .command("init")
    .description("Write a commented starter configuration")
    .option("-g, --global", `Write the system file at ${SYSTEM_CONFIG_PATH}`)
    .option("-z, --time-zone <zone>", "Fill in the time zone")
    .option("-f, --force", "Replace an existing file")
    .action((options: InitOptions) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (options.timeZone !== undefined && !isValidTimeZone(options.timeZone)) {
        renderUnknownError(timeZoneInvalid(options.timeZone));
        process.exitCode = 1;
        return;
      }

      if (existsSync(targetPath) && !options.force) {
        console.error(chalk.yellow(`${targetPath} already exists`));
        console.error(chalk.gray("Pass --force to replace it."));
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, renderExampleConfig(options.timeZone), "utf-8");
        console.log(chalk.green(`Wrote ${targetPath}`));
        if (options.timeZone === undefined) {
          console.log(chalk.gray("Set timeZone before running show or watch."));
        }
      } catch (error) {
        console.error(chalk.red(`Couldn't write ${targetPath}: ${describeError(error)}`));
        if (options.global) {
          console.error(chalk.gray("Writing under /etc usually needs sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Check configuration files without starting anything")
    .option("-c, --config <path>", "Check only this file")
    .action((options: { config?: string }) => {
      const checks = checkConfigFiles(
        options.config ? [options.config] : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH]
      );
      const failed = checks.some(
        (c) => c.status === "invalid" || (options.config !== undefined && c.status === "missing")
      );
      if (failed) {
        process.exitCode = 1;
      }

      if (maybeOutputJson({ valid: !failed, files: checks })) return;

      if (!options.config && checks.every((c) => c.status === "missing")) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray("Run 'timedate config init' to create one."));
        return;
      }

      for (const check of checks) {
        switch (check.status) {
          case "valid":
            console.log(`${chalk.green("✓")} ${check.path}`);
            break;
          case "invalid":
            console.error(`${chalk.red("✗")} ${check.path}`);
            console.error(check.error ?? "");
            break;
          case "missing":
            if (options.config) {
              console.error(`${chalk.red("✗")} ${check.path} does not exist`);
            }
            break;
        }
      }
    });

  config
    .command("show")
    .description("Print the settings after every source is merged")
    .option("-c, --config <path>", "Use this file instead of the standard locations")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);
        const document = toConfigDocument(resolved);

        if (maybeOutputJson({ sources, config: document })) return;

        console.log(
          chalk.gray(`# sources: ${sources.length > 0 ? sources.join(", ") : "defaults only"}`)
        );
        console.log(stringifyYaml(document).trimEnd());
        if (resolved.timeZone === undefined) {
          console.log(chalk.yellow("timeZone is not set; show and watch will refuse to start."));
        }
      } catch (error) {
        renderUnknownError(error);
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("List the configuration file locations")
    .action(() => {
      const table = new CliTable3({
        head: [chalk.cyan("Scope"), chalk.cyan("Path"), chalk.cyan("Status")],
      });
      for (const [scope, path] of [
        ["user", USER_CONFIG_PATH],
        ["system", SYSTEM_CONFIG_PATH],
      ]) {
        table.push([
          scope,
          path,
          existsSync(path) ? chalk.green("exists") : chalk.gray("not found"),
        ]);
      }
      console.log(table.toString());
    });
}
