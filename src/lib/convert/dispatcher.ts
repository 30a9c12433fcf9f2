import * as fs from "node:fs";
import * as path from "node:path";
import pLimit from "p-limit";
import type { ToolName } from "../../config";
import { ExternalToolError, UnsupportedPairError } from "../errors";
import {
  isSupportedPair,
  supportedPairs,
  type SourceFormat,
  type TargetFormat,
} from "../formats";
import { type ProcessRunner, withWorkDir } from "../process";
import { log } from "../utils/log";
import {
  markdownStrategy,
  ocrStrategy,
  officeStrategy,
  rasterStrategy,
  scanStrategy,
  tablesStrategy,
  textStrategy,
} from "./strategies";
import type {
  ConversionOutput,
  ConversionRequest,
  ConversionStrategy,
  StrategyContext,
} from "./types";

type PairKey = `${SourceFormat}->${TargetFormat}`;

export function pairKey(from: SourceFormat, to: TargetFormat): PairKey {
  return `${from}->${to}`;
}

export const STRATEGY_TABLE: ReadonlyMap<PairKey, ConversionStrategy> = new Map<
  PairKey,
  ConversionStrategy
>([
  ["pdf->docx", officeStrategy],
  ["pdf->xlsx", tablesStrategy],
  ["pdf->pptx", officeStrategy],
  ["pdf->jpg", rasterStrategy],
  ["pdf->png", rasterStrategy],
  ["pdf->scanned_pdf", scanStrategy],
  ["pdf->searchable_pdf", ocrStrategy],
  ["jpg->pdf", officeStrategy],
  ["jpeg->pdf", officeStrategy],
  ["png->pdf", officeStrategy],
  ["jpg->searchable_pdf", ocrStrategy],
  ["jpeg->searchable_pdf", ocrStrategy],
  ["png->searchable_pdf", ocrStrategy],
  ["doc->pdf", officeStrategy],
  ["docx->pdf", officeStrategy],
  ["xls->pdf", officeStrategy],
  ["xlsx->pdf", officeStrategy],
  ["ppt->pdf", officeStrategy],
  ["pptx->pdf", officeStrategy],
  ["txt->pdf", textStrategy],
  ["md->pdf", markdownStrategy],
]);

/** Registry pairs with no strategy behind them. Empty when configured correctly. */
export function missingStrategies(): Array<[SourceFormat, TargetFormat]> {
  return supportedPairs().filter(([from, to]) => !STRATEGY_TABLE.has(pairKey(from, to)));
}

export interface DispatcherOptions {
  runner: ProcessRunner;
  tools: Record<ToolName, string>;
  /** Root for per-conversion scratch directories */
  tempRoot: string;
  timeoutMs: number;
  ocrLang: string;
  maxConcurrent: number;
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.promises.rename(from, to);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== "EXDEV") throw err;
    await fs.promises.copyFile(from, to);
    await fs.promises.unlink(from);
  }
}

async function fileSize(filePath: string): Promise<number> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isFile() ? stat.size : 0;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return 0;
    throw err;
  }
}

/**
 * Selects a strategy for a (from, to) pair and runs it inside a scratch
 * directory. Nothing is spawned for a pair the registry does not declare.
 */
export class ConversionDispatcher {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(private readonly options: DispatcherOptions) {
    this.limit = pLimit(Math.max(1, options.maxConcurrent));
  }

  strategyFor(from: SourceFormat, to: TargetFormat): ConversionStrategy {
    const strategy = isSupportedPair(from, to)
      ? STRATEGY_TABLE.get(pairKey(from, to))
      : undefined;
    if (!strategy) throw new UnsupportedPairError(from, to);
    return strategy;
  }

  /** Jobs waiting for a free conversion slot. */
  get pending(): number {
    return this.limit.pendingCount;
  }

  async convert(request: ConversionRequest): Promise<ConversionOutput> {
    const strategy = this.strategyFor(request.from, request.to);
    return this.limit(() => this.runStrategy(strategy, request));
  }

  private async runStrategy(
    strategy: ConversionStrategy,
    request: ConversionRequest,
  ): Promise<ConversionOutput> {
    const { runner, tools, tempRoot, timeoutMs, ocrLang } = this.options;
    const deadline = Date.now() + timeoutMs;
    log.info(
      "dispatcher",
      `${request.from} -> ${request.to} via ${strategy.name} (quality ${request.quality})`,
    );

    return withWorkDir(tempRoot, "job", async (workDir) => {
      const inputPath = path.join(workDir, `source.${request.from}`);
      await fs.promises.copyFile(request.inputPath, inputPath);

      const ctx: StrategyContext = {
        runner,
        tools,
        workDir,
        inputPath,
        from: request.from,
        to: request.to,
        quality: request.quality,
        ocrLang,
        timeoutMs,
        remainingMs: () => deadline - Date.now(),
      };

      const produced = await strategy.run(ctx);

      // Some tools exit 0 after writing nothing; only a real file counts.
      const size = await fileSize(produced.path);
      if (size === 0) {
        throw new ExternalToolError(
          produced.tool,
          `no output produced for ${request.from} -> ${request.to}`,
        );
      }

      await fs.promises.mkdir(request.outputDir, { recursive: true });
      const finalPath = path.join(
        request.outputDir,
        `${request.outputBaseName}.${produced.extension}`,
      );
      await moveFile(produced.path, finalPath);
      log.debug("dispatcher", `wrote ${finalPath} (${size} bytes)`);
      return { path: finalPath, extension: produced.extension, size };
    });
  }
}
