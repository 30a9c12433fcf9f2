import type * as http from "node:http";
import { Command } from "commander";
import ora from "ora";
import { missingStrategies } from "../lib/convert";
import { createServer, createService } from "../lib/server";
import { log } from "../lib/utils/log";
import { type CliOptions, resolveConfig } from "./options";

function listen(server: http.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });
}

export const serve = new Command("serve")
  .description("Run the conversion HTTP API")
  .option("-p, --port <port>", "Port to listen on")
  .option("--host <host>", "Interface to bind")
  .option("--retention-hours <hours>", "Hours a converted file stays downloadable")
  .option("--timeout <ms>", "Time budget for one conversion, in milliseconds")
  .action(async (_args, cmd: Command) => {
    const options = cmd.optsWithGlobals<CliOptions>();

    try {
      const config = resolveConfig(options);
      const service = createService(config);

      const spinner = ora("Preparing storage...").start();
      try {
        await service.lifecycle.init();
        spinner.succeed(`Storage ready (uploads: ${config.paths.uploads})`);
      } catch (e) {
        spinner.fail("Storage setup failed");
        throw e;
      }

      const missing = missingStrategies();
      if (missing.length > 0) {
        log.warn(
          "serve",
          `no strategy for ${missing.map(([from, to]) => `${from}->${to}`).join(", ")}`,
        );
      }

      service.sweeper.start();
      const server = createServer(service);
      await listen(server, config.port, config.host);
      console.log(
        `docshift listening on http://${config.host}:${config.port} (results kept ${config.retentionMs / 3_600_000}h)`,
      );

      const shutdown = async () => {
        log.info("serve", "shutting down");
        await service.sweeper.stop();
        server.close(() => process.exit(0));
        server.closeIdleConnections();
      };

      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error("Serve failed:", message);
      process.exitCode = 1;
    }
  });
