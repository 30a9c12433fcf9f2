import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ExternalToolError, ToolTimeoutError } from "../src/lib/errors";
import { ChildProcessRunner, runTool, withWorkDir } from "../src/lib/process";

const node = process.execPath;

describe("ChildProcessRunner", () => {
  const runner = new ChildProcessRunner(200);

  it("captures output and the exit code", async () => {
    const result = await runner.run(
      node,
      ["-e", "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"],
      { timeoutMs: 10_000 },
    );
    expect(result.code).toBe(3);
    expect(result.signal).toBeNull();
    expect(result.stdout).toBe("out");
    expect(result.stderr).toBe("err");
  });

  it("keeps only the tail of very long output", async () => {
    const result = await runner.run(
      node,
      ["-e", "process.stdout.write('a'.repeat(100000) + 'END')"],
      { timeoutMs: 10_000 },
    );
    expect(result.stdout.length).toBe(64 * 1024);
    expect(result.stdout.endsWith("aEND")).toBe(true);
  });

  it("terminates a process that runs past its timeout", async () => {
    const started = Date.now();
    await expect(
      runner.run(node, ["-e", "setInterval(() => {}, 1000)"], { timeoutMs: 300 }),
    ).rejects.toBeInstanceOf(ToolTimeoutError);
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("kills a process that ignores SIGTERM", async () => {
    await expect(
      runner.run(
        node,
        ["-e", "process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)"],
        { timeoutMs: 500 },
      ),
    ).rejects.toBeInstanceOf(ToolTimeoutError);
  });

  it("stops waiting when a forked grandchild keeps the pipes open", async () => {
    const started = Date.now();
    await expect(
      runner.run("sh", ["-c", "sleep 8; true"], { timeoutMs: 300 }),
    ).rejects.toBeInstanceOf(ToolTimeoutError);
    expect(Date.now() - started).toBeLessThan(3_000);
  });

  it("reports a missing executable as a tool error", async () => {
    const error = await runner
      .run("docshift-missing-tool", [], { timeoutMs: 1_000 })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({
      detail: "docshift-missing-tool: executable not found (docshift-missing-tool)",
    });
  });
});

describe("runTool", () => {
  it("turns a nonzero exit into a tool error carrying the last stderr line", async () => {
    const error = await runTool(
      new ChildProcessRunner(),
      node,
      ["-e", "console.error('first'); console.error('last'); process.exit(2)"],
      { timeoutMs: 10_000 },
    ).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({ detail: `${node}: exit code 2: last` });
  });
});

describe("withWorkDir", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "docshift-scope-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("removes the directory after success", async () => {
    const seen = await withWorkDir(root, "job", async (dir) => {
      await fs.writeFile(path.join(dir, "partial.pdf"), "x");
      return dir;
    });
    expect(path.basename(seen).startsWith("job-")).toBe(true);
    await expect(fs.stat(seen)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("removes the directory when the callback throws", async () => {
    let seen = "";
    await expect(
      withWorkDir(root, "job", async (dir) => {
        seen = dir;
        await fs.writeFile(path.join(dir, "partial.pdf"), "x");
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(seen).not.toBe("");
    expect(await fs.readdir(root)).toEqual([]);
  });
});
