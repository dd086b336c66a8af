import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Setup Errors
// ============================================================================

export function timeZoneMissing(): CLIError {
  return new CLIError("SETUP_TIME_ZONE_MISSING", "No time zone is configured", {
    suggestion: "Pass --time-zone, set TIMEDATE_TIME_ZONE, or add timeZone to your config file",
    examples: [
      "timedate watch --time-zone Europe/Berlin",
      "TIMEDATE_TIME_ZONE=UTC timedate show",
    ],
  });
}

export function timeZoneInvalid(timeZone: string): CLIError {
  return new CLIError("SETUP_TIME_ZONE_INVALID", `Unknown time zone "${timeZone}"`, {
    suggestion: "Use an IANA zone name such as UTC, Europe/Berlin or America/New_York",
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function unknownKind(value: string, validKinds: string[]): CLIError {
  return new CLIError("VALIDATION_UNKNOWN_KIND", `Unknown representation "${value}"`, {
    suggestion: `Choose from: ${validKinds.join(", ")}`,
    examples: ["timedate kinds"],
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the listed issues and run the command again",
    details,
  });
}

// ============================================================================
// Sensor Errors
// ============================================================================

export function timerArmFailed(sensorId: string, cause: unknown): CLIError {
  return new CLIError("TIMER_ARM_FAILED", `Couldn't schedule the next update for ${sensorId}`, {
    suggestion: "The sensor stays idle until it is activated again",
    details: describe(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

export function sinkPublishFailed(sensorId: string, cause: unknown): CLIError {
  return new CLIError("SINK_PUBLISH_FAILED", `Couldn't publish the value of ${sensorId}`, {
    suggestion: "The sensor stays idle until it is activated again",
    details: describe(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

export function sinkRemoveFailed(sensorId: string, cause: unknown): CLIError {
  return new CLIError("SINK_REMOVE_FAILED", `Couldn't withdraw the value of ${sensorId}`, {
    suggestion: "The sensor is stopped; its last value may still be shown",
    details: describe(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

// ============================================================================
// Programming Errors
// ============================================================================

export function unhandledKind(value: string): CLIError {
  return new CLIError("INTERNAL_UNKNOWN_KIND", `No handler for representation "${value}"`, {
    details: "A value outside the representation catalog reached the formatter",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;
  return new CLIError("UNKNOWN_ERROR", message, { cause });
}

/**
 * Wrap anything thrown into a CLIError, keeping CLIErrors as they are.
 */
export function toCLIError(error: unknown): CLIError {
  return error instanceof CLIError ? error : unknownError(error);
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
