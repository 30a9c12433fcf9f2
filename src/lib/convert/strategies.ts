import * as fs from "node:fs";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { marked } from "marked";
import { ToolTimeoutError } from "../errors";
import type { Quality, SourceFormat } from "../formats";
import { runTool } from "../process";
import { writeZipArchive } from "./archive";
import type { ConversionStrategy, StrategyContext, StrategyOutput } from "./types";

/** Resolution used when rasterizing for OCR; tesseract does best around 300. */
export const OCR_DPI = 300;

const PDF_IMAGE_QUALITY: Record<Quality, number> = { 1: 50, 2: 75, 3: 90 };
const PDF_IMAGE_MAX_DPI: Record<Quality, number> = { 1: 150, 2: 300, 3: 600 };
const JPEG_QUALITY: Record<Quality, number> = { 1: 60, 2: 80, 3: 95 };

export function rasterDpi(quality: Quality): number {
  return 100 * quality;
}

export function scanDpi(quality: Quality): number {
  return 150 * quality;
}

function budget(ctx: StrategyContext, tool: string): number {
  const left = ctx.remainingMs();
  if (left <= 0) throw new ToolTimeoutError(tool, ctx.timeoutMs);
  return left;
}

/**
 * LibreOffice PDF export options. Image quality and downsampling are the
 * knobs `quality` turns.
 */
export function pdfExportOptions(quality: Quality): string {
  return JSON.stringify({
    Quality: { type: "long", value: String(PDF_IMAGE_QUALITY[quality]) },
    ReduceImageResolution: { type: "boolean", value: "true" },
    MaxImageResolution: { type: "long", value: String(PDF_IMAGE_MAX_DPI[quality]) },
  });
}

function pdfExportFilter(from: SourceFormat): string {
  switch (from) {
    case "xls":
    case "xlsx":
      return "calc_pdf_Export";
    case "ppt":
    case "pptx":
      return "impress_pdf_Export";
    case "jpg":
    case "jpeg":
    case "png":
      return "draw_pdf_Export";
    default:
      return "writer_pdf_Export";
  }
}

export function pdfConvertTarget(from: SourceFormat, quality: Quality): string {
  return `pdf:${pdfExportFilter(from)}:${pdfExportOptions(quality)}`;
}

/**
 * Build a headless LibreOffice invocation. Each call gets its own profile
 * directory inside the work dir; concurrent instances sharing a profile
 * block each other.
 */
export function sofficeArgs(
  workDir: string,
  convertTo: string,
  outDir: string,
  inputs: string[],
  inFilter?: string,
): string[] {
  const profile = pathToFileURL(path.join(workDir, "lo-profile")).href;
  return [
    "--headless",
    "--norestore",
    "--nolockcheck",
    `-env:UserInstallation=${profile}`,
    ...(inFilter ? [`--infilter=${inFilter}`] : []),
    "--convert-to",
    convertTo,
    "--outdir",
    outDir,
    ...inputs,
  ];
}

async function soffice(
  ctx: StrategyContext,
  convertTo: string,
  inputs: string[],
  outDir: string,
  inFilter?: string,
): Promise<void> {
  await fs.promises.mkdir(outDir, { recursive: true });
  await runTool(
    ctx.runner,
    ctx.tools.soffice,
    sofficeArgs(ctx.workDir, convertTo, outDir, inputs, inFilter),
    { cwd: ctx.workDir, timeoutMs: budget(ctx, ctx.tools.soffice) },
  );
}

function stem(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

/**
 * List pdftoppm output (`page-1.png`, `page-01.png`, ...) in page order.
 */
export async function listPages(dir: string, extension: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.promises.readdir(dir);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
  const pattern = new RegExp(`^page-(\\d+)\\.${extension}$`);
  return names
    .map((name) => ({ name, match: pattern.exec(name) }))
    .filter((entry): entry is { name: string; match: RegExpExecArray } => entry.match !== null)
    .sort((a, b) => Number(a.match[1]) - Number(b.match[1]))
    .map((entry) => path.join(dir, entry.name));
}

async function rasterize(
  ctx: StrategyContext,
  dpi: number,
  image: "png" | "jpg",
  extraArgs: string[] = [],
): Promise<string[]> {
  const pagesDir = path.join(ctx.workDir, "pages");
  await fs.promises.mkdir(pagesDir, { recursive: true });
  const formatArgs =
    image === "png"
      ? ["-png"]
      : ["-jpeg", "-jpegopt", `quality=${JPEG_QUALITY[ctx.quality]}`];
  await runTool(
    ctx.runner,
    ctx.tools.pdftoppm,
    ["-r", String(dpi), ...formatArgs, ...extraArgs, ctx.inputPath, path.join(pagesDir, "page")],
    { cwd: ctx.workDir, timeoutMs: budget(ctx, ctx.tools.pdftoppm) },
  );
  return listPages(pagesDir, image);
}

/** Office documents and images to PDF; PDF to Word or PowerPoint. */
export const officeStrategy: ConversionStrategy = {
  name: "office",
  async run(ctx): Promise<StrategyOutput> {
    const outDir = path.join(ctx.workDir, "out");
    if (ctx.from === "pdf" && ctx.to === "docx") {
      await soffice(ctx, "docx:MS Word 2007 XML", [ctx.inputPath], outDir, "writer_pdf_import");
      return { path: path.join(outDir, `${stem(ctx.inputPath)}.docx`), extension: "docx", tool: ctx.tools.soffice };
    }
    if (ctx.from === "pdf" && ctx.to === "pptx") {
      await soffice(
        ctx,
        "pptx:Impress MS PowerPoint 2007 XML",
        [ctx.inputPath],
        outDir,
        "impress_pdf_import",
      );
      return { path: path.join(outDir, `${stem(ctx.inputPath)}.pptx`), extension: "pptx", tool: ctx.tools.soffice };
    }
    await soffice(ctx, pdfConvertTarget(ctx.from, ctx.quality), [ctx.inputPath], outDir);
    return { path: path.join(outDir, `${stem(ctx.inputPath)}.pdf`), extension: "pdf", tool: ctx.tools.soffice };
  },
};

/** Plain text rendered straight to PDF through the text import filter. */
export const textStrategy: ConversionStrategy = {
  name: "text",
  async run(ctx): Promise<StrategyOutput> {
    const outDir = path.join(ctx.workDir, "out");
    await soffice(
      ctx,
      pdfConvertTarget(ctx.from, ctx.quality),
      [ctx.inputPath],
      outDir,
      "Text (encoded):UTF8",
    );
    return { path: path.join(outDir, `${stem(ctx.inputPath)}.pdf`), extension: "pdf", tool: ctx.tools.soffice };
  },
};

const MARKDOWN_STYLE = `
body { font-family: Arial, sans-serif; line-height: 1.6; margin: 0 auto; max-width: 800px; padding: 20px; }
h1, h2, h3, h4, h5, h6 { color: #333; margin-top: 20px; }
code, pre { background-color: #f5f5f5; }
pre { padding: 16px; }
blockquote { border-left: 5px solid #ddd; padding-left: 15px; color: #555; }
table { border-collapse: collapse; width: 100%; }
table, th, td { border: 1px solid #ddd; }
th, td { padding: 8px; text-align: left; }
`;

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Wrap rendered Markdown in a standalone UTF-8 HTML document. */
export async function renderMarkdownDocument(source: string, title: string): Promise<string> {
  const body = await marked.parse(source, { gfm: true });
  return [
    "<!DOCTYPE html>",
    "<html>",
    "<head>",
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${MARKDOWN_STYLE}</style>`,
    "</head>",
    "<body>",
    body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

/**
 * Markdown rendered to HTML (GFM tables and fenced code) and laid out by
 * Writer's HTML import, so headings and tables survive into the PDF.
 */
export const markdownStrategy: ConversionStrategy = {
  name: "markdown",
  async run(ctx): Promise<StrategyOutput> {
    const source = await fs.promises.readFile(ctx.inputPath, "utf-8");
    const htmlPath = path.join(ctx.workDir, "document.html");
    await fs.promises.writeFile(
      htmlPath,
      await renderMarkdownDocument(source, stem(ctx.inputPath)),
      "utf-8",
    );
    const outDir = path.join(ctx.workDir, "out");
    await soffice(
      ctx,
      `pdf:writer_pdf_Export:${pdfExportOptions(ctx.quality)}`,
      [htmlPath],
      outDir,
      "HTML (StarWriter)",
    );
    return { path: path.join(outDir, "document.pdf"), extension: "pdf", tool: ctx.tools.soffice };
  },
};

/**
 * Tables in a PDF extracted by tabula-java into CSV, then loaded into a Calc
 * workbook. Quality 2 and up uses lattice mode, which follows ruling lines.
 * A PDF without tables yields an empty workbook.
 */
export const tablesStrategy: ConversionStrategy = {
  name: "tables",
  async run(ctx): Promise<StrategyOutput> {
    const csvPath = path.join(ctx.workDir, "tables.csv");
    await runTool(
      ctx.runner,
      ctx.tools.java,
      [
        "-jar",
        ctx.tools.tabula,
        "--pages",
        "all",
        ...(ctx.quality >= 2 ? ["--lattice"] : []),
        "--format",
        "CSV",
        "--outfile",
        csvPath,
        ctx.inputPath,
      ],
      { cwd: ctx.workDir, timeoutMs: budget(ctx, ctx.tools.java) },
    );
    const outDir = path.join(ctx.workDir, "out");
    // 44 = comma separator, 34 = double quote, 76 = UTF-8.
    await soffice(ctx, "xlsx:Calc MS Excel 2007 XML", [csvPath], outDir, "CSV:44,34,76,1");
    return { path: path.join(outDir, "tables.xlsx"), extension: "xlsx", tool: ctx.tools.soffice };
  },
};

/**
 * PDF pages to images. A single page comes back as the image itself; more
 * pages are bundled into a zip of `page_<n>.<ext>` entries.
 */
export const rasterStrategy: ConversionStrategy = {
  name: "raster",
  async run(ctx): Promise<StrategyOutput> {
    const image = ctx.to === "png" ? "png" : "jpg";
    const pages = await rasterize(ctx, rasterDpi(ctx.quality), image);
    if (pages.length <= 1) {
      return {
        path: pages[0] ?? path.join(ctx.workDir, "pages", `page-1.${image}`),
        extension: image,
        tool: ctx.tools.pdftoppm,
      };
    }
    const zipPath = path.join(ctx.workDir, "pages.zip");
    await writeZipArchive(
      pages.map((sourcePath, i) => ({ name: `page_${i + 1}.${image}`, sourcePath })),
      zipPath,
    );
    return { path: zipPath, extension: "zip", tool: ctx.tools.pdftoppm };
  },
};

/**
 * Re-render a PDF as page images wrapped back into a PDF, the way a scanner
 * would produce it. Below top quality the pages are grayscale.
 */
export const scanStrategy: ConversionStrategy = {
  name: "scan",
  async run(ctx): Promise<StrategyOutput> {
    const pages = await rasterize(
      ctx,
      scanDpi(ctx.quality),
      "jpg",
      ctx.quality < 3 ? ["-gray"] : [],
    );
    if (pages.length === 0) {
      return { path: path.join(ctx.workDir, "scan.pdf"), extension: "pdf", tool: ctx.tools.pdftoppm };
    }

    const pdfDir = path.join(ctx.workDir, "page-pdfs");
    await soffice(ctx, pdfConvertTarget("jpg", ctx.quality), pages, pdfDir);
    const pagePdfs = pages.map((page) => path.join(pdfDir, `${stem(page)}.pdf`));
    if (pagePdfs.length === 1) {
      return { path: pagePdfs[0], extension: "pdf", tool: ctx.tools.soffice };
    }

    const output = path.join(ctx.workDir, "scan.pdf");
    await runTool(ctx.runner, ctx.tools.pdfunite, [...pagePdfs, output], {
      cwd: ctx.workDir,
      timeoutMs: budget(ctx, ctx.tools.pdfunite),
    });
    return { path: output, extension: "pdf", tool: ctx.tools.pdfunite };
  },
};

/**
 * OCR into a PDF with an invisible text layer. PDFs are rasterized first;
 * tesseract reads a multi-page input from a list file.
 */
export const ocrStrategy: ConversionStrategy = {
  name: "ocr",
  async run(ctx): Promise<StrategyOutput> {
    let ocrInput = ctx.inputPath;
    if (ctx.from === "pdf") {
      const pages = await rasterize(ctx, OCR_DPI, "png");
      ocrInput = path.join(ctx.workDir, "pages.txt");
      await fs.promises.writeFile(ocrInput, `${pages.join("\n")}\n`, "utf-8");
    }
    const outBase = path.join(ctx.workDir, "ocr");
    await runTool(
      ctx.runner,
      ctx.tools.tesseract,
      [ocrInput, outBase, "-l", ctx.ocrLang, "pdf"],
      { cwd: ctx.workDir, timeoutMs: budget(ctx, ctx.tools.tesseract) },
    );
    return { path: `${outBase}.pdf`, extension: "pdf", tool: ctx.tools.tesseract };
  },
};
