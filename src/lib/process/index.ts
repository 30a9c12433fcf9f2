export { ChildProcessRunner } from "./runner";
export type { ProcessRunner, RunOptions, RunResult } from "./runner";
export { runTool, withWorkDir } from "./scope";
