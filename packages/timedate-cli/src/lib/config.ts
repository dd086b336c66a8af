import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { invalidConfig } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, isLogLevel, type LogLevel } from "./logger.js";
import { REPRESENTATION_KINDS, type RepresentationKind } from "./representation.js";
import { isValidTimeZone } from "./zone.js";

// ---------------------------------------------------------------------------
// Locations and Defaults
// ---------------------------------------------------------------------------

export const SYSTEM_CONFIG_PATH = "/etc/timedate/config.yaml";

/** Under $HOME/.config, following XDG */
export const USER_CONFIG_PATH = join(homedir(), ".config", "timedate", "config.yaml");

export const CONFIG_DEFAULTS = {
  displayOptions: ["time"],
  baseId: "timedate",
  logLevel: "info",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// File Schema
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z.object({
  timeZone: z
    .string()
    .refine(isValidTimeZone, { message: "Unknown time zone" })
    .optional(),
  displayOptions: z.array(z.enum(REPRESENTATION_KINDS)).optional(),
  baseId: z
    .string()
    .regex(/^[A-Za-z0-9_]+$/, "Use letters, digits and underscores only")
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Settings after every layer is applied */
export interface ResolvedConfig {
  /** Checked again when the sensor set is created, which fails without one */
  timeZone: string | undefined;
  displayOptions: RepresentationKind[];
  baseId: string;
  logLevel: LogLevel;
  logJson: boolean;
}

type ConfigLayer = Partial<ResolvedConfig>;

// ---------------------------------------------------------------------------
// Reading Files
// ---------------------------------------------------------------------------

/**
 * Parse and validate one YAML file. A file that does not exist yields
 * undefined; an empty one yields no settings.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new Error(
      `Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [
      `Invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }

  if (document === null || document === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(document);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    );
  }
  return result.data;
}

function layerFromFile(file: ConfigFile): ConfigLayer {
  return {
    timeZone: file.timeZone,
    displayOptions: file.displayOptions && [...file.displayOptions],
    baseId: file.baseId,
    logLevel: file.logging?.level,
    logJson: file.logging?.json,
  };
}

/**
 * TIMEDATE_TIME_ZONE and TIMEDATE_LOG_LEVEL. Blank or unknown values are
 * ignored.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {};

  const timeZone = env.TIMEDATE_TIME_ZONE?.trim();
  if (timeZone) {
    layer.timeZone = timeZone;
  }

  const level = env.TIMEDATE_LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(level)) {
    layer.logLevel = level;
  }

  return layer;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/** Copy only the settings a layer actually sets */
function applyLayer(target: ResolvedConfig, layer: ConfigLayer): void {
  if (layer.timeZone !== undefined) target.timeZone = layer.timeZone;
  if (layer.displayOptions !== undefined) target.displayOptions = layer.displayOptions;
  if (layer.baseId !== undefined) target.baseId = layer.baseId;
  if (layer.logLevel !== undefined) target.logLevel = layer.logLevel;
  if (layer.logJson !== undefined) target.logJson = layer.logJson;
}

/**
 * Defaults, then system file, user file, environment and CLI flags, each
 * overriding the one before.
 */
export function resolveConfig(
  cliOptions: ConfigLayer = {},
  userConfig?: ConfigFile,
  systemConfig?: ConfigFile,
  envOverrides: ConfigLayer = {}
): ResolvedConfig {
  const config: ResolvedConfig = {
    timeZone: undefined,
    displayOptions: [...CONFIG_DEFAULTS.displayOptions],
    baseId: CONFIG_DEFAULTS.baseId,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  const layers: ConfigLayer[] = [
    systemConfig ? layerFromFile(systemConfig) : {},
    userConfig ? layerFromFile(userConfig) : {},
    envOverrides,
    cliOptions,
  ];
  for (const layer of layers) {
    applyLayer(config, layer);
  }

  return config;
}

/**
 * Read the config files and merge every layer.
 *
 * @param explicitPath - Used in place of both the system and user files
 * @returns The settings and the files that contributed to them
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: ConfigLayer = {},
  env: NodeJS.ProcessEnv = process.env
): { config: ResolvedConfig; sources: string[] } {
  const sources: string[] = [];
  const read = (path: string): ConfigFile | undefined => {
    const file = loadConfigFile(path);
    if (file) sources.push(path);
    return file;
  };

  const systemConfig = explicitPath ? undefined : read(SYSTEM_CONFIG_PATH);
  const userConfig = read(explicitPath ? explicitPath : USER_CONFIG_PATH);

  return {
    config: resolveConfig(cliOptions, userConfig, systemConfig, readEnvOverrides(env)),
    sources,
  };
}
