import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Lowest to highest severity */
export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of bracketed text */
  json: boolean;
  /** Source of log timestamps */
  clock?: Clock;
  /** Write every level to stderr, leaving stdout to the command's own output */
  stderrOnly?: boolean;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger that adds `context` to every line; per-call meta wins on conflicts */
  child(context: LogMeta): Logger;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

// ---------------------------------------------------------------------------
// Line Formatting
// ---------------------------------------------------------------------------

const severity = (level: LogLevel): number => LOG_LEVEL_NAMES.indexOf(level);

function formatJsonLine(timestamp: string, level: LogLevel, message: string, meta: LogMeta): string {
  return JSON.stringify({ timestamp, level, message, ...meta });
}

function formatTextLine(timestamp: string, level: LogLevel, message: string, meta: LogMeta): string {
  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
}

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Structured logger. debug and info go to stdout, warn and error to stderr,
 * unless `stderrOnly` sends everything to stderr.
 */
export function createLogger(options: LoggerOptions): Logger {
  const threshold = severity(options.level);
  const clock = options.clock ?? systemClock;
  const format = options.json ? formatJsonLine : formatTextLine;

  function write(level: LogLevel, message: string, meta: LogMeta): void {
    if (severity(level) < threshold) return;

    const line = format(clock.newDate().toISOString(), level, message, meta);
    if (options.stderrOnly || severity(level) >= severity("warn")) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  function bind(context: LogMeta): Logger {
    return {
      debug: (message, meta) => write("debug", message, { ...context, ...meta }),
      info: (message, meta) => write("info", message, { ...context, ...meta }),
      warn: (message, meta) => write("warn", message, { ...context, ...meta }),
      error: (message, meta) => write("error", message, { ...context, ...meta }),
      child: (extra) => bind({ ...context, ...extra }),
    };
  }

  return bind({});
}

/**
 * Logger that discards everything, for library callers that pass none.
 */
export function createNoopLogger(): Logger {
  const discard = (): void => {};
  const logger: Logger = {
    debug: discard,
    info: discard,
    warn: discard,
    error: discard,
    child: () => logger,
  };
  return logger;
}
