#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { program } from "commander";
import { doctor } from "./commands/doctor";
import { formats } from "./commands/formats";
import { serve } from "./commands/serve";
import { sweep } from "./commands/sweep";

function readVersion(): string {
  const pkg: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, "../package.json"), {
      encoding: "utf-8",
    }),
  );
  return typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string"
    ? pkg.version
    : "0.0.0";
}

program
  .name("docshift")
  .version(readVersion())
  .option("-c, --config <path>", "JSON config file (also DOCSHIFT_CONFIG)")
  .option("--data-dir <dir>", "Root directory for uploads, results and metadata")
  .option("--debug", "Verbose logging");

program.addCommand(serve);
program.addCommand(formats);
program.addCommand(sweep);
program.addCommand(doctor);

program.parse();
