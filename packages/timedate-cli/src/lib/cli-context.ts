/**
 * Flags every command honours. They are read from argv before commander
 * runs, so errors raised while parsing already render in the right mode.
 */

export type OutputMode = "text" | "json";

export interface CLIContext {
  output: OutputMode;
  /** Only warnings and errors are logged */
  quiet: boolean;
}

const DEFAULT_CONTEXT: CLIContext = { output: "text", quiet: false };

let context: CLIContext = { ...DEFAULT_CONTEXT };

function flagSet(argv: string[], names: string[], envValue: string | undefined): boolean {
  return names.some((name) => argv.includes(name)) || envValue === "1" || envValue === "true";
}

/**
 * Read --json and --quiet, or TIMEDATE_JSON and TIMEDATE_QUIET.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  context = {
    output: flagSet(argv, ["--json"], env.TIMEDATE_JSON) ? "json" : "text",
    quiet: flagSet(argv, ["--quiet", "-q"], env.TIMEDATE_QUIET),
  };
  return context;
}

export function getOutputMode(): OutputMode {
  return context.output;
}

export function isJsonMode(): boolean {
  return context.output === "json";
}

export function isQuietMode(): boolean {
  return context.quiet;
}

/**
 * Back to text output (for testing).
 */
export function resetContext(): void {
  context = { ...DEFAULT_CONTEXT };
}
