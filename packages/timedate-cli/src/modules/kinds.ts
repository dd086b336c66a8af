import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { maybeOutputJson, type KindsResultJson } from "../lib/json-output.js";
import { REPRESENTATION_KINDS, iconFor, labelFor } from "../lib/representation.js";

export function listKinds(): KindsResultJson {
  return {
    kinds: REPRESENTATION_KINDS.map((kind) => ({
      kind,
      label: labelFor(kind),
      icon: iconFor(kind),
    })),
  };
}

export function registerKindsCommands(program: Command): void {
  program
    .command("kinds")
    .description("List every supported representation")
    .action(() => {
      const result = listKinds();
      if (maybeOutputJson(result)) return;

      const table = new CliTable3({
        head: [chalk.cyan("Kind"), chalk.cyan("Label"), chalk.cyan("Icon")],
      });
      for (const entry of result.kinds) {
        table.push([entry.kind, entry.label, chalk.gray(entry.icon)]);
      }
      console.log(table.toString());
    });
}
