import * as fs from "node:fs";
import * as path from "node:path";
import { ToolTimeoutError } from "../../src/lib/errors";
import type { ProcessRunner, RunOptions, RunResult } from "../../src/lib/process";

export type ToolBehaviour = "ok" | "empty" | "fail" | "timeout";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

const OK: Omit<RunResult, "durationMs"> = { code: 0, signal: null, stdout: "", stderr: "" };

function result(partial: Partial<RunResult> = {}): RunResult {
  return { ...OK, durationMs: 1, ...partial };
}

function argAfter(args: string[], flag: string): string {
  const index = args.indexOf(flag);
  return index === -1 ? "" : args[index + 1] ?? "";
}

/**
 * Stands in for soffice, pdftoppm, pdfunite, tesseract and java: records every
 * spawn and writes the files the real tool would have written.
 */
export class FakeRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  /** Pages pdftoppm "renders" */
  pages = 1;
  /** Text of HTML and CSV files handed to soffice, by base name */
  readonly inputText = new Map<string, string>();
  private readonly behaviours = new Map<string, ToolBehaviour>();

  set(tool: string, behaviour: ToolBehaviour): this {
    this.behaviours.set(tool, behaviour);
    return this;
  }

  spawnsOf(tool: string): RecordedCall[] {
    return this.calls.filter((call) => path.basename(call.command) === tool);
  }

  async run(command: string, args: string[], options: RunOptions): Promise<RunResult> {
    this.calls.push({ command, args, options });
    const tool = path.basename(command);

    if (args.includes("--version") || args[0] === "-v" || args[0] === "-version") {
      return result({ stdout: `${tool} 1.0.0\n` });
    }

    if (tool === "soffice") {
      for (const input of args.filter((arg) => /\.(html|csv)$/.test(arg))) {
        this.inputText.set(path.basename(input), await fs.promises.readFile(input, "utf-8"));
      }
    }

    const behaviour = this.behaviours.get(tool) ?? "ok";
    if (behaviour === "fail") {
      return result({ code: 1, stderr: `${tool}: cannot open input\n` });
    }

    const outputs = this.outputsFor(tool, args);
    for (const output of outputs) {
      await fs.promises.mkdir(path.dirname(output), { recursive: true });
      await fs.promises.writeFile(output, behaviour === "empty" ? "" : `${tool} output\n`);
    }

    if (behaviour === "timeout") {
      // Partial output is left behind, as a killed tool would.
      throw new ToolTimeoutError(command, options.timeoutMs);
    }
    return result();
  }

  private outputsFor(tool: string, args: string[]): string[] {
    switch (tool) {
      case "soffice": {
        const outDir = argAfter(args, "--outdir");
        const ext = argAfter(args, "--convert-to").split(":")[0];
        const inputs = args.slice(args.indexOf("--outdir") + 2);
        return inputs.map((input) =>
          path.join(outDir, `${path.basename(input, path.extname(input))}.${ext}`),
        );
      }
      case "pdftoppm": {
        const prefix = args[args.length - 1];
        const ext = args.includes("-png") ? "png" : "jpg";
        return Array.from({ length: this.pages }, (_, i) => `${prefix}-${i + 1}.${ext}`);
      }
      case "pdfunite":
        return [args[args.length - 1]];
      case "tesseract":
        return [`${args[1]}.pdf`];
      case "java":
        return [argAfter(args, "--outfile")];
      default:
        return [];
    }
  }
}
