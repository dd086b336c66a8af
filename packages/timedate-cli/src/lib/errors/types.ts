/**
 * Every error the CLI reports, grouped by the prefix of its code:
 * SETUP_ aborts a whole sensor set, VALIDATION_ rejects user input,
 * TIMER_ and SINK_ stop a single sensor, INTERNAL_ marks a bug.
 */
export const ERROR_CODES = [
  "SETUP_TIME_ZONE_MISSING",
  "SETUP_TIME_ZONE_INVALID",
  "VALIDATION_UNKNOWN_KIND",
  "VALIDATION_CONFIG_INVALID",
  "TIMER_ARM_FAILED",
  "SINK_PUBLISH_FAILED",
  "SINK_REMOVE_FAILED",
  "INTERNAL_UNKNOWN_KIND",
  "UNKNOWN_ERROR",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export type ErrorCategory = "setup" | "validation" | "sensor" | "internal" | "unknown";

export function errorCategory(code: ErrorCode): ErrorCategory {
  if (code.startsWith("SETUP_")) return "setup";
  if (code.startsWith("VALIDATION_")) return "validation";
  if (code.startsWith("TIMER_") || code.startsWith("SINK_")) return "sensor";
  if (code.startsWith("INTERNAL_")) return "internal";
  return "unknown";
}

export interface CLIErrorOptions {
  /** What the user can do about it */
  suggestion?: string;
  /** Commands worth trying; the renderer shows up to three */
  examples?: string[];
  /** Extra lines shown under the message */
  details?: string;
  cause?: Error;
}

export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly examples: string[];
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options: CLIErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.examples = options.examples ?? [];
    this.details = options.details;
  }

  get category(): ErrorCategory {
    return errorCategory(this.code);
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

export function isSetupError(error: unknown): error is CLIError {
  return isCLIError(error) && error.category === "setup";
}
