import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TOOLS } from "../src/config";
import {
  ConversionDispatcher,
  missingStrategies,
  STRATEGY_TABLE,
  pairKey,
} from "../src/lib/convert";
import { ExternalToolError, ToolTimeoutError, UnsupportedPairError } from "../src/lib/errors";
import { supportedPairs, type Quality, type SourceFormat, type TargetFormat } from "../src/lib/formats";
import { renderMarkdownDocument } from "../src/lib/convert/strategies";
import { FakeRunner } from "./helpers/fake-runner";

describe("strategy table", () => {
  it("has a strategy for every declared pair and nothing else", () => {
    expect(missingStrategies()).toEqual([]);
    expect(STRATEGY_TABLE.size).toBe(supportedPairs().length);
  });

  it("routes pairs to the expected strategies", () => {
    expect(STRATEGY_TABLE.get(pairKey("pdf", "docx"))?.name).toBe("office");
    expect(STRATEGY_TABLE.get(pairKey("txt", "pdf"))?.name).toBe("text");
    expect(STRATEGY_TABLE.get(pairKey("md", "pdf"))?.name).toBe("markdown");
    expect(STRATEGY_TABLE.get(pairKey("pdf", "xlsx"))?.name).toBe("tables");
    expect(STRATEGY_TABLE.get(pairKey("pdf", "jpg"))?.name).toBe("raster");
    expect(STRATEGY_TABLE.get(pairKey("pdf", "scanned_pdf"))?.name).toBe("scan");
    expect(STRATEGY_TABLE.get(pairKey("png", "searchable_pdf"))?.name).toBe("ocr");
  });
});

describe("renderMarkdownDocument", () => {
  it("renders headings and GFM tables inside a UTF-8 page", async () => {
    const html = await renderMarkdownDocument("# Title\n\n| a | b |\n|---|---|\n| 1 | 2 |\n", "notes");
    expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(html).toContain('<meta charset="utf-8">');
    expect(html).toContain("<h1>Title</h1>");
    expect(html).toContain("<table>");
    expect(html).toContain("<td>1</td>");
  });

  it("escapes the document title", async () => {
    const html = await renderMarkdownDocument("text", "a<b & c");
    expect(html).toContain("<title>a&lt;b &amp; c</title>");
  });
});

describe("ConversionDispatcher", () => {
  let root: string;
  let tempRoot: string;
  let outputDir: string;
  let runner: FakeRunner;
  let dispatcher: ConversionDispatcher;

  async function input(name: string, content = "input bytes"): Promise<string> {
    const file = path.join(root, "in", name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content);
    return file;
  }

  async function convert(
    name: string,
    from: SourceFormat,
    to: TargetFormat,
    quality: Quality = 2,
    content?: string,
  ) {
    return dispatcher.convert({
      inputPath: await input(name, content),
      from,
      to,
      quality,
      outputDir,
      outputBaseName: "report",
    });
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "docshift-dispatch-"));
    tempRoot = path.join(root, "work");
    outputDir = path.join(root, "results");
    runner = new FakeRunner();
    dispatcher = new ConversionDispatcher({
      runner,
      tools: { ...TOOLS },
      tempRoot,
      timeoutMs: 10_000,
      ocrLang: "eng",
      maxConcurrent: 2,
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("rejects an undeclared pair without spawning anything", async () => {
    await expect(convert("a.docx", "docx", "pptx")).rejects.toBeInstanceOf(UnsupportedPairError);
    expect(runner.calls).toHaveLength(0);
  });

  it("converts pdf to docx through the writer import filter", async () => {
    const output = await convert("report.pdf", "pdf", "docx");

    expect(output).toEqual({
      path: path.join(outputDir, "report.docx"),
      extension: "docx",
      size: "soffice output\n".length,
    });
    const [call] = runner.spawnsOf("soffice");
    expect(call.args).toContain("--infilter=writer_pdf_import");
    expect(call.args[call.args.indexOf("--convert-to") + 1]).toBe("docx:MS Word 2007 XML");
    expect(call.args.some((arg) => arg.startsWith("-env:UserInstallation=file://"))).toBe(true);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it("passes image quality settings to the pdf export filter", async () => {
    await convert("photo.png", "png", "pdf", 3);
    const [call] = runner.spawnsOf("soffice");
    const target = call.args[call.args.indexOf("--convert-to") + 1];
    expect(target.startsWith("pdf:draw_pdf_Export:")).toBe(true);
    expect(JSON.parse(target.slice("pdf:draw_pdf_Export:".length))).toMatchObject({
      Quality: { value: "90" },
      MaxImageResolution: { value: "600" },
    });
  });

  it("renders plain text through the UTF-8 text import filter", async () => {
    const output = await convert("notes.txt", "txt", "pdf");
    expect(output.extension).toBe("pdf");
    expect(runner.spawnsOf("soffice")[0].args).toContain("--infilter=Text (encoded):UTF8");
  });

  it("lays out markdown as HTML so headings survive", async () => {
    const output = await convert("notes.md", "md", "pdf", 2, "# Heading\n\nBody text\n");

    expect(output).toEqual({
      path: path.join(outputDir, "report.pdf"),
      extension: "pdf",
      size: "soffice output\n".length,
    });
    const [call] = runner.spawnsOf("soffice");
    expect(call.args).toContain("--infilter=HTML (StarWriter)");
    expect(call.args[call.args.indexOf("--convert-to") + 1].startsWith("pdf:writer_pdf_Export:")).toBe(
      true,
    );
    expect(path.basename(call.args[call.args.length - 1])).toBe("document.html");
    expect(runner.inputText.get("document.html")).toContain("<h1>Heading</h1>");
  });

  it("extracts pdf tables with tabula in lattice mode, then builds a workbook", async () => {
    const output = await convert("report.pdf", "pdf", "xlsx", 2);

    expect(output).toEqual({
      path: path.join(outputDir, "report.xlsx"),
      extension: "xlsx",
      size: "soffice output\n".length,
    });
    const [extract] = runner.spawnsOf("java");
    expect(extract.args.slice(0, 6)).toEqual([
      "-jar",
      TOOLS.tabula,
      "--pages",
      "all",
      "--lattice",
      "--format",
    ]);
    expect(path.basename(extract.args[extract.args.indexOf("--outfile") + 1])).toBe("tables.csv");
    const [workbook] = runner.spawnsOf("soffice");
    expect(workbook.args).toContain("--infilter=CSV:44,34,76,1");
    expect(workbook.args[workbook.args.indexOf("--convert-to") + 1]).toBe(
      "xlsx:Calc MS Excel 2007 XML",
    );
    expect(runner.inputText.get("tables.csv")).toBe("java output\n");
  });

  it("uses tabula stream mode at low quality", async () => {
    await convert("report.pdf", "pdf", "xlsx", 1);
    expect(runner.spawnsOf("java")[0].args).not.toContain("--lattice");
  });

  it("fails when the tool exits cleanly but writes an empty file", async () => {
    runner.set("soffice", "empty");
    const error = await convert("report.pdf", "pdf", "docx").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExternalToolError);
    await expect(fs.readdir(outputDir)).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("keeps tool stderr out of the public message", async () => {
    runner.set("soffice", "fail");
    const error = await convert("report.docx", "docx", "pdf").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({
      message: "File conversion failed",
      detail: "soffice: exit code 1: soffice: cannot open input",
    });
  });

  it("removes the work directory after a timeout", async () => {
    runner.set("soffice", "timeout");
    await expect(convert("report.docx", "docx", "pdf")).rejects.toBeInstanceOf(ToolTimeoutError);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it("returns a single page as the image itself", async () => {
    const output = await convert("report.pdf", "pdf", "jpg", 1);
    expect(output.extension).toBe("jpg");
    expect(output.path).toBe(path.join(outputDir, "report.jpg"));
    const [call] = runner.spawnsOf("pdftoppm");
    expect(call.args.slice(0, 5)).toEqual(["-r", "100", "-jpeg", "-jpegopt", "quality=60"]);
  });

  it("zips multi-page image output with page_N entries", async () => {
    runner.pages = 3;
    const output = await convert("report.pdf", "pdf", "png");

    expect(output.extension).toBe("zip");
    expect(output.path).toBe(path.join(outputDir, "report.zip"));
    const zip = await JSZip.loadAsync(await fs.readFile(output.path));
    expect(Object.keys(zip.files).sort()).toEqual(["page_1.png", "page_2.png", "page_3.png"]);
  });

  it("builds a grayscale scan from page images below top quality", async () => {
    runner.pages = 2;
    const output = await convert("report.pdf", "pdf", "scanned_pdf", 1);

    expect(output.extension).toBe("pdf");
    const [raster] = runner.spawnsOf("pdftoppm");
    expect(raster.args.slice(0, 2)).toEqual(["-r", "150"]);
    expect(raster.args).toContain("-gray");
    expect(runner.spawnsOf("soffice")).toHaveLength(1);
    expect(runner.spawnsOf("pdfunite")).toHaveLength(1);
  });

  it("keeps colour in a top-quality scan", async () => {
    await convert("report.pdf", "pdf", "scanned_pdf", 3);
    const [raster] = runner.spawnsOf("pdftoppm");
    expect(raster.args.slice(0, 2)).toEqual(["-r", "450"]);
    expect(raster.args).not.toContain("-gray");
    expect(runner.spawnsOf("pdfunite")).toHaveLength(0);
  });

  it("rasterizes a pdf at 300 dpi before OCR", async () => {
    runner.pages = 2;
    await convert("report.pdf", "pdf", "searchable_pdf", 1);

    const [raster] = runner.spawnsOf("pdftoppm");
    expect(raster.args.slice(0, 3)).toEqual(["-r", "300", "-png"]);
    const [ocr] = runner.spawnsOf("tesseract");
    expect(path.basename(ocr.args[0])).toBe("pages.txt");
    expect(ocr.args.slice(2)).toEqual(["-l", "eng", "pdf"]);
  });

  it("hands images straight to tesseract", async () => {
    const output = await convert("scan.jpg", "jpg", "searchable_pdf");
    expect(runner.spawnsOf("pdftoppm")).toHaveLength(0);
    expect(path.basename(runner.spawnsOf("tesseract")[0].args[0])).toBe("source.jpg");
    expect(output.path).toBe(path.join(outputDir, "report.pdf"));
  });
});
