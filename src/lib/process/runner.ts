import { spawn } from "node:child_process";
import { ExternalToolError, ToolTimeoutError } from "../errors";
import { log } from "../utils/log";

export interface RunOptions {
  cwd?: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
}

export interface RunResult {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Launches external binaries. The dispatcher only ever talks to this
 * interface so tests can substitute a recording fake.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options: RunOptions): Promise<RunResult>;
}

const MAX_CAPTURE_BYTES = 64 * 1024;
const FORCE_KILL_GRACE_MS = 2_000;

/**
 * Keeps the last `limit` bytes written to it; tool diagnostics usually sit at
 * the end of the stream.
 */
class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer) {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.limit && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      if (dropped) this.size -= dropped.length;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    const start = Math.max(0, joined.length - this.limit);
    return joined.subarray(start).toString("utf-8");
  }
}

/**
 * Signal the child's whole process group. Tools such as soffice fork helpers
 * that inherit the stdio pipes; signalling only the direct child leaves them
 * running and holding the pipes open.
 */
function killGroup(pid: number | undefined, signal: NodeJS.Signals): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, signal);
  } catch (err) {
    // ESRCH: the group is already gone.
    if ((err as NodeJS.ErrnoException).code === "ESRCH") return;
    log.error("process", `failed to send ${signal} to group ${pid}`, err);
  }
}

export class ChildProcessRunner implements ProcessRunner {
  constructor(private readonly forceKillGraceMs = FORCE_KILL_GRACE_MS) {}

  run(command: string, args: string[], options: RunOptions): Promise<RunResult> {
    const started = Date.now();
    log.debug("process", `spawn ${command} ${args.join(" ")}`);

    return new Promise<RunResult>((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ["ignore", "pipe", "pipe"],
        shell: false,
        detached: true,
      });

      const stdout = new TailBuffer(MAX_CAPTURE_BYTES);
      const stderr = new TailBuffer(MAX_CAPTURE_BYTES);
      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      let timedOut = false;
      let settled = false;
      let forceKill: NodeJS.Timeout | undefined;

      const timer = setTimeout(() => {
        timedOut = true;
        log.warn(
          "process",
          `${command} exceeded ${options.timeoutMs}ms (pid ${child.pid ?? "?"}); terminating`,
        );
        killGroup(child.pid, "SIGTERM");
        forceKill = setTimeout(() => killGroup(child.pid, "SIGKILL"), this.forceKillGraceMs);
      }, options.timeoutMs);

      const cleanup = () => {
        clearTimeout(timer);
        if (forceKill) clearTimeout(forceKill);
      };

      child.on("error", (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        cleanup();
        const reason =
          err.code === "ENOENT" ? `executable not found (${command})` : err.message;
        reject(new ExternalToolError(command, reason));
      });

      // A timed-out child may leave descendants holding the pipes, so "close"
      // could never fire. Settle on "exit" and reap the rest of the group.
      child.on("exit", () => {
        if (settled || !timedOut) return;
        settled = true;
        cleanup();
        killGroup(child.pid, "SIGKILL");
        child.stdout.destroy();
        child.stderr.destroy();
        reject(new ToolTimeoutError(command, options.timeoutMs));
      });

      // "close" fires after the stdio streams drain, so captured output is complete.
      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;
        cleanup();
        const durationMs = Date.now() - started;
        if (timedOut) {
          reject(new ToolTimeoutError(command, options.timeoutMs));
          return;
        }
        log.debug(
          "process",
          `${command} exited with ${code ?? signal} in ${durationMs}ms`,
        );
        resolve({
          code,
          signal,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          durationMs,
        });
      });
    });
  }
}
