import * as os from "node:os";
import * as path from "node:path";

export const API_VERSION = "1.0.0";

const DEFAULT_MAX_CONCURRENT = (() => {
  const cores = os.cpus().length || 1;
  const HARD_CAP = 4;
  return Math.max(1, Math.min(HARD_CAP, cores));
})();

export const DEFAULTS = {
  HOST: "0.0.0.0",
  PORT: 5000,
  DATA_DIR: "data",
  TEMP_DIR: path.join(os.tmpdir(), "docshift"),
  RETENTION_HOURS: 24,
  SWEEP_INTERVAL_MS: 60 * 60 * 1000,
  TOOL_TIMEOUT_MS: 120_000,
  MAX_UPLOAD_BYTES: 100 * 1024 * 1024,
  MAX_CONCURRENT_CONVERSIONS: DEFAULT_MAX_CONCURRENT,
  // Matches the language packs installed in the container image.
  OCR_LANG: "chi_sim+eng",
};

export const TOOL_NAMES = [
  "soffice",
  "pdftoppm",
  "pdfunite",
  "tesseract",
  "java",
  "tabula",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Default commands. `tabula` is the tabula-java jar that `java -jar` runs. */
export const TOOLS: Record<ToolName, string> = {
  soffice: "soffice",
  pdftoppm: "pdftoppm",
  pdfunite: "pdfunite",
  tesseract: "tesseract",
  java: "java",
  tabula: "/opt/tabula/tabula.jar",
};

export const ENV = {
  host: "DOCSHIFT_HOST",
  port: "DOCSHIFT_PORT",
  debug: "DOCSHIFT_DEBUG",
  dataDir: "DOCSHIFT_DATA_DIR",
  uploadDir: "DOCSHIFT_UPLOAD_DIR",
  resultDir: "DOCSHIFT_RESULT_DIR",
  metadataDir: "DOCSHIFT_METADATA_DIR",
  tempDir: "DOCSHIFT_TEMP_DIR",
  retentionHours: "DOCSHIFT_RETENTION_HOURS",
  sweepIntervalMs: "DOCSHIFT_SWEEP_INTERVAL_MS",
  toolTimeoutMs: "DOCSHIFT_TOOL_TIMEOUT_MS",
  maxUploadBytes: "DOCSHIFT_MAX_UPLOAD_BYTES",
  maxConcurrent: "DOCSHIFT_MAX_CONCURRENT",
  ocrLang: "DOCSHIFT_OCR_LANG",
  configFile: "DOCSHIFT_CONFIG",
} as const;

export const TOOL_ENV: Record<ToolName, string> = {
  soffice: "DOCSHIFT_SOFFICE_BIN",
  pdftoppm: "DOCSHIFT_PDFTOPPM_BIN",
  pdfunite: "DOCSHIFT_PDFUNITE_BIN",
  tesseract: "DOCSHIFT_TESSERACT_BIN",
  java: "DOCSHIFT_JAVA_BIN",
  tabula: "DOCSHIFT_TABULA_JAR",
};
