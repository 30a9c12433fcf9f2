import * as os from "node:os";
import { Command } from "commander";
import { missingStrategies } from "../lib/convert";
import { probeTools } from "../lib/server";
import { ChildProcessRunner } from "../lib/process";
import { LocalFileStore } from "../lib/store";
import { type CliOptions, resolveConfig } from "./options";

export const doctor = new Command("doctor")
  .description("Check storage directories and external converters")
  .action(async (_args, cmd: Command) => {
    const options = cmd.optsWithGlobals<CliOptions>();
    try {
      const config = resolveConfig(options);
      console.log("🏥 docshift Doctor\n");

      const store = new LocalFileStore(config.paths);
      const directories = await store.checkDirectories();
      for (const dir of directories) {
        const symbol = dir.exists && dir.writable ? "✅" : "❌";
        const note = !dir.exists ? " (missing, created on serve)" : dir.writable ? "" : " (read-only)";
        console.log(`${symbol} ${dir.name}: ${dir.path}${note}`);
      }

      console.log("");
      const tools = await probeTools(new ChildProcessRunner(), config.tools);
      for (const tool of tools) {
        if (tool.available) {
          console.log(`✅ ${tool.name}: ${tool.version ?? tool.command}`);
        } else {
          console.log(`❌ ${tool.name}: ${tool.error ?? "unavailable"} (${tool.command})`);
        }
      }

      const missing = missingStrategies();
      if (missing.length > 0) {
        console.log(`\n❌ Pairs with no strategy: ${missing.map(([f, t]) => `${f}->${t}`).join(", ")}`);
      }

      console.log(
        `\nSystem: ${os.platform()} ${os.arch()} | Node: ${process.version} | OCR languages: ${config.ocrLang}`,
      );

      if (tools.some((tool) => !tool.available) || missing.length > 0) {
        console.log("\nSome conversions will fail until the missing tools are installed.");
        process.exitCode = 1;
      } else {
        console.log("\nIf you see ✅ everywhere, you are ready to convert!");
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Doctor failed:", message);
      process.exitCode = 1;
    }
  });
