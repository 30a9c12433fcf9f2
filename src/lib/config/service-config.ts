import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULTS, ENV, TOOL_ENV, TOOL_NAMES, TOOLS, type ToolName } from "../../config";

export interface StoragePaths {
  uploads: string;
  results: string;
  metadata: string;
  /** Root for per-conversion scratch directories */
  temp: string;
}

export interface ServiceConfig {
  host: string;
  port: number;
  debug: boolean;
  paths: StoragePaths;
  retentionMs: number;
  sweepIntervalMs: number;
  toolTimeoutMs: number;
  maxUploadBytes: number;
  maxConcurrentConversions: number;
  ocrLang: string;
  tools: Record<ToolName, string>;
}

/**
 * Shape of the optional JSON config file. CLI flags use the same keys.
 */
export interface ConfigFile {
  host?: string;
  port?: number;
  debug?: boolean;
  dataDir?: string;
  uploadDir?: string;
  resultDir?: string;
  metadataDir?: string;
  tempDir?: string;
  retentionHours?: number;
  sweepIntervalMs?: number;
  toolTimeoutMs?: number;
  maxUploadBytes?: number;
  maxConcurrent?: number;
  ocrLang?: string;
  tools?: Partial<Record<ToolName, string>>;
}

export type ConfigOverrides = ConfigFile;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInt(value: unknown): number | undefined {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string"
        ? Number(value.trim())
        : Number.NaN;
  if (Number.isInteger(parsed) && parsed > 0) return parsed;
  return undefined;
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

function flag(value: unknown): boolean | undefined {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true") return true;
  if (normalized === "0" || normalized === "false") return false;
  return undefined;
}

/**
 * Validate parsed JSON into a ConfigFile, dropping fields of the wrong type.
 */
export function parseConfigFile(raw: unknown): ConfigFile {
  if (!isRecord(raw)) return {};

  const tools: Partial<Record<ToolName, string>> = {};
  if (isRecord(raw.tools)) {
    for (const name of TOOL_NAMES) {
      const bin = nonEmpty(raw.tools[name]);
      if (bin) tools[name] = bin;
    }
  }

  return {
    host: nonEmpty(raw.host),
    port: positiveInt(raw.port),
    debug: typeof raw.debug === "boolean" ? raw.debug : undefined,
    dataDir: nonEmpty(raw.dataDir),
    uploadDir: nonEmpty(raw.uploadDir),
    resultDir: nonEmpty(raw.resultDir),
    metadataDir: nonEmpty(raw.metadataDir),
    tempDir: nonEmpty(raw.tempDir),
    retentionHours: positiveInt(raw.retentionHours),
    sweepIntervalMs: positiveInt(raw.sweepIntervalMs),
    toolTimeoutMs: positiveInt(raw.toolTimeoutMs),
    maxUploadBytes: positiveInt(raw.maxUploadBytes),
    maxConcurrent: positiveInt(raw.maxConcurrent),
    ocrLang: nonEmpty(raw.ocrLang),
    tools,
  };
}

/**
 * Load a JSON config file. A missing path yields an empty config; an
 * unreadable or malformed file is an error the caller should report.
 */
export function loadConfigFile(filePath?: string): ConfigFile {
  if (!filePath) return {};
  const content = fs.readFileSync(filePath, "utf-8");
  return parseConfigFile(JSON.parse(content));
}

/**
 * Merge CLI overrides, environment, config file and defaults, in that order.
 */
export function resolveServiceConfig(
  overrides: ConfigOverrides = {},
  file: ConfigFile = {},
  env: Env = process.env,
): ServiceConfig {
  const dataDir = path.resolve(
    overrides.dataDir ?? nonEmpty(env[ENV.dataDir]) ?? file.dataDir ?? DEFAULTS.DATA_DIR,
  );
  const dir = (
    override: string | undefined,
    envKey: string,
    fromFile: string | undefined,
    fallback: string,
  ) => path.resolve(override ?? nonEmpty(env[envKey]) ?? fromFile ?? fallback);

  const tools = { ...TOOLS };
  for (const name of TOOL_NAMES) {
    tools[name] =
      overrides.tools?.[name] ??
      nonEmpty(env[TOOL_ENV[name]]) ??
      file.tools?.[name] ??
      TOOLS[name];
  }

  const retentionHours =
    overrides.retentionHours ??
    positiveInt(env[ENV.retentionHours]) ??
    file.retentionHours ??
    DEFAULTS.RETENTION_HOURS;

  return {
    host: overrides.host ?? nonEmpty(env[ENV.host]) ?? file.host ?? DEFAULTS.HOST,
    port: overrides.port ?? positiveInt(env[ENV.port]) ?? file.port ?? DEFAULTS.PORT,
    debug: overrides.debug ?? flag(env[ENV.debug]) ?? file.debug ?? false,
    paths: {
      uploads: dir(overrides.uploadDir, ENV.uploadDir, file.uploadDir, path.join(dataDir, "uploads")),
      results: dir(overrides.resultDir, ENV.resultDir, file.resultDir, path.join(dataDir, "results")),
      metadata: dir(overrides.metadataDir, ENV.metadataDir, file.metadataDir, path.join(dataDir, "metadata")),
      temp: dir(overrides.tempDir, ENV.tempDir, file.tempDir, DEFAULTS.TEMP_DIR),
    },
    retentionMs: retentionHours * 60 * 60 * 1000,
    sweepIntervalMs:
      overrides.sweepIntervalMs ??
      positiveInt(env[ENV.sweepIntervalMs]) ??
      file.sweepIntervalMs ??
      DEFAULTS.SWEEP_INTERVAL_MS,
    toolTimeoutMs:
      overrides.toolTimeoutMs ??
      positiveInt(env[ENV.toolTimeoutMs]) ??
      file.toolTimeoutMs ??
      DEFAULTS.TOOL_TIMEOUT_MS,
    maxUploadBytes:
      overrides.maxUploadBytes ??
      positiveInt(env[ENV.maxUploadBytes]) ??
      file.maxUploadBytes ??
      DEFAULTS.MAX_UPLOAD_BYTES,
    maxConcurrentConversions:
      overrides.maxConcurrent ??
      positiveInt(env[ENV.maxConcurrent]) ??
      file.maxConcurrent ??
      DEFAULTS.MAX_CONCURRENT_CONVERSIONS,
    ocrLang: overrides.ocrLang ?? nonEmpty(env[ENV.ocrLang]) ?? file.ocrLang ?? DEFAULTS.OCR_LANG,
    tools,
  };
}

/**
 * Convenience used by the CLI: read the config file named by `--config` or
 * DOCSHIFT_CONFIG, then resolve.
 */
export function loadServiceConfig(
  overrides: ConfigOverrides = {},
  configPath?: string,
  env: Env = process.env,
): ServiceConfig {
  const file = loadConfigFile(configPath ?? nonEmpty(env[ENV.configFile]));
  return resolveServiceConfig(overrides, file, env);
}

export { positiveInt as parsePositiveInt };
