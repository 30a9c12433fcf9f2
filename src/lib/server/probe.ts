import { TOOL_NAMES, type ToolName } from "../../config";
import { ServiceError } from "../errors";
import type { ProcessRunner } from "../process";

export interface ToolStatus {
  name: ToolName;
  command: string;
  available: boolean;
  version?: string;
  error?: string;
}

// poppler tools have no --version; -v prints to stderr, as does java -version.
const VERSION_ARGS: Record<ToolName, string[]> = {
  soffice: ["--version"],
  pdftoppm: ["-v"],
  pdfunite: ["-v"],
  tesseract: ["--version"],
  java: ["-version"],
  tabula: ["--version"],
};

const PROBE_TIMEOUT_MS = 15_000;

function firstLine(text: string): string | undefined {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .find((line) => line !== "");
}

/**
 * Probe one tool. The tabula jar is not executable itself; it is launched
 * through `launcher`, the configured java binary.
 */
export async function probeTool(
  runner: ProcessRunner,
  name: ToolName,
  command: string,
  timeoutMs = PROBE_TIMEOUT_MS,
  launcher?: string,
): Promise<ToolStatus> {
  const [bin, args]: [string, string[]] = launcher
    ? [launcher, ["-jar", command, ...VERSION_ARGS[name]]]
    : [command, VERSION_ARGS[name]];
  try {
    const result = await runner.run(bin, args, { timeoutMs });
    const version = firstLine(result.stdout) ?? firstLine(result.stderr);
    if (result.code === 0 || version) {
      return { name, command, available: true, version };
    }
    return { name, command, available: false, error: `exit code ${result.code ?? result.signal}` };
  } catch (err) {
    const error =
      err instanceof ServiceError
        ? err.detail ?? err.message
        : err instanceof Error
          ? err.message
          : String(err);
    return { name, command, available: false, error };
  }
}

export function probeTools(
  runner: ProcessRunner,
  tools: Record<ToolName, string>,
  timeoutMs?: number,
): Promise<ToolStatus[]> {
  return Promise.all(
    TOOL_NAMES.map((name) =>
      probeTool(runner, name, tools[name], timeoutMs, name === "tabula" ? tools.java : undefined),
    ),
  );
}
