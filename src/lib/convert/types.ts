import type { ToolName } from "../../config";
import type { SourceFormat, TargetFormat, Quality } from "../formats";
import type { ProcessRunner } from "../process";

/**
 * A single conversion handed to the dispatcher
 */
export interface ConversionRequest {
  inputPath: string;
  from: SourceFormat;
  to: TargetFormat;
  quality: Quality;
  /** Directory the finished file is moved into */
  outputDir: string;
  /** File name of the result, without extension */
  outputBaseName: string;
}

/**
 * The finished file, already placed in the request's output directory
 */
export interface ConversionOutput {
  path: string;
  /** Extension without dot; `zip` for multi-page image output */
  extension: string;
  size: number;
}

export type StrategyName =
  | "office"
  | "text"
  | "markdown"
  | "tables"
  | "raster"
  | "scan"
  | "ocr";

/**
 * What a strategy gets to work with. `inputPath` is a private copy inside
 * `workDir`, so tools may write next to it freely.
 */
export interface StrategyContext {
  runner: ProcessRunner;
  tools: Record<ToolName, string>;
  workDir: string;
  inputPath: string;
  from: SourceFormat;
  to: TargetFormat;
  quality: Quality;
  ocrLang: string;
  /** Whole-job budget shared by every tool the strategy runs */
  timeoutMs: number;
  /** Milliseconds left in that budget */
  remainingMs(): number;
}

export interface StrategyOutput {
  path: string;
  extension: string;
  /** Tool blamed when the output turns out empty */
  tool: string;
}

export interface ConversionStrategy {
  name: StrategyName;
  run(ctx: StrategyContext): Promise<StrategyOutput>;
}
