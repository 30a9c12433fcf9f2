import { Command } from "commander";
import ora from "ora";
import { createService } from "../lib/server";
import { type CliOptions, resolveConfig } from "./options";

export const sweep = new Command("sweep")
  .description("Delete uploads and results older than the retention window, once")
  .option("--retention-hours <hours>", "Override the retention window")
  .action(async (_args, cmd: Command) => {
    const options = cmd.optsWithGlobals<CliOptions>();

    try {
      const config = resolveConfig(options);
      const { lifecycle } = createService(config);
      await lifecycle.init();

      const spinner = ora(
        `Sweeping files older than ${config.retentionMs / 3_600_000}h...`,
      ).start();
      const report = await lifecycle.sweep().catch((e: unknown) => {
        spinner.fail("Sweep failed");
        throw e;
      });
      const summary = `Removed ${report.removedJobs} expired jobs and ${report.removedOrphans} orphaned directories`;
      if (report.failures > 0) {
        spinner.warn(`${summary}; ${report.failures} could not be removed`);
        process.exitCode = 1;
      } else {
        spinner.succeed(summary);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Sweep failed:", message);
      process.exitCode = 1;
    }
  });
