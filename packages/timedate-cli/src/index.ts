#!/usr/bin/env node
import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerKindsCommands } from "./modules/kinds.js";
import { registerShowCommands } from "./modules/show.js";
import { registerWatchCommands } from "./modules/watch.js";

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("timedate")
    .description("Time, date and Internet Time values that refresh on their own boundaries")
    .version(readVersion())
    .option("--json", "Output machine-readable JSON")
    .option("-q, --quiet", "Only log warnings and errors");

  registerShowCommands(program);
  registerWatchCommands(program);
  registerKindsCommands(program);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
