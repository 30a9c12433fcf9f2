import { Command } from "commander";
import { listFormats, outputExtension, type TargetFormat } from "../lib/formats";
import type { CliOptions } from "./options";

const style = {
  bold: (s: string) => `\x1b[1m${s}\x1b[22m`,
  dim: (s: string) => `\x1b[2m${s}\x1b[22m`,
  green: (s: string) => `\x1b[32m${s}\x1b[39m`,
};

function describeTarget(target: TargetFormat): string {
  const ext = outputExtension(target);
  return ext === target ? target : `${target} ${style.dim(`(.${ext})`)}`;
}

export const formats = new Command("formats")
  .description("Show every supported source format and its targets")
  .option("--json", "Print the table as JSON, as GET /api/formats returns it")
  .action((_args, cmd: Command) => {
    const options = cmd.optsWithGlobals<CliOptions>();
    const table = listFormats();

    if (options.json) {
      console.log(JSON.stringify(table, null, 2));
      return;
    }

    const width = Math.max(...Object.keys(table).map((from) => from.length));
    console.log(`\n${style.bold("Source")}${" ".repeat(width - 4)}  ${style.bold("Targets")}`);
    for (const [from, targets] of Object.entries(table)) {
      console.log(`${style.green(from.padEnd(width))}  ${targets.map(describeTarget).join(", ")}`);
    }
    console.log("");
  });
