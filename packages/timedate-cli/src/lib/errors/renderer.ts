import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { toCLIError } from "./catalog.js";
import { getOutputMode, type OutputMode } from "../cli-context.js";

const MAX_EXAMPLES = 3;

/**
 * Text lines for an error: the message, then any details, the suggestion
 * and example commands, each block preceded by a blank line.
 */
export function formatTextError(error: CLIError): string[] {
  const blocks: string[][] = [
    [`${chalk.red("✗")} ${chalk.red.bold(error.message)}`],
  ];

  if (error.details) {
    blocks.push(error.details.split("\n").map((line) => `  ${chalk.dim(line)}`));
  }

  if (error.suggestion) {
    blocks.push([`  ${chalk.yellow("→")} ${error.suggestion}`]);
  }

  const examples = error.examples.slice(0, MAX_EXAMPLES);
  if (examples.length === 1) {
    blocks.push([`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`]);
  } else if (examples.length > 1) {
    blocks.push([
      `  ${chalk.dim("Examples:")}`,
      ...examples.map((example) => `    ${chalk.cyan(`$ ${example}`)}`),
    ]);
  }

  return blocks.flatMap((block) => ["", ...block]);
}

/**
 * JSON shape of an error. Empty fields are left out.
 */
export function formatJsonError(error: CLIError): Record<string, unknown> {
  return {
    error: true,
    code: error.code,
    category: error.category,
    message: error.message,
    ...(error.suggestion && { suggestion: error.suggestion }),
    ...(error.examples.length > 0 && { examples: error.examples }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Write an error to stderr as text lines or one JSON document.
 */
export function renderError(error: CLIError, mode: OutputMode = getOutputMode()): void {
  if (mode === "json") {
    console.error(JSON.stringify(formatJsonError(error), null, 2));
    return;
  }
  for (const line of [...formatTextError(error), ""]) {
    console.error(line);
  }
}

/**
 * Render anything that was thrown; non-CLIErrors become UNKNOWN_ERROR.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(toCLIError(error), mode);
}

export { CLIError, isCLIError };
