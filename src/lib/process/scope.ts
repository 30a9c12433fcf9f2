import * as fs from "node:fs";
import * as path from "node:path";
import { ExternalToolError } from "../errors";
import { log } from "../utils/log";
import type { ProcessRunner, RunOptions, RunResult } from "./runner";

/**
 * Run `fn` inside a fresh directory under `root`. The directory and
 * everything the tools wrote into it are removed on every exit path.
 */
export async function withWorkDir<T>(
  root: string,
  prefix: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  await fs.promises.mkdir(root, { recursive: true });
  const dir = await fs.promises.mkdtemp(path.join(root, `${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    try {
      await fs.promises.rm(dir, { recursive: true, force: true });
    } catch (err) {
      log.error("process", `failed to remove work dir ${dir}`, err);
    }
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split(/\r?\n/);
  return lines[lines.length - 1] ?? "";
}

/**
 * Run a tool and treat a nonzero exit or a signal as a failed conversion.
 */
export async function runTool(
  runner: ProcessRunner,
  command: string,
  args: string[],
  options: RunOptions,
): Promise<RunResult> {
  const result = await runner.run(command, args, options);
  if (result.code !== 0) {
    const status =
      result.code === null ? `signal ${result.signal ?? "unknown"}` : `exit code ${result.code}`;
    const tail = lastLine(result.stderr) || lastLine(result.stdout);
    throw new ExternalToolError(command, tail ? `${status}: ${tail}` : status);
  }
  return result;
}
