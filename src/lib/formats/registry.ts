import { UnsupportedFormatError, UnsupportedPairError } from "../errors";

export const SOURCE_FORMATS = [
  "pdf",
  "docx",
  "doc",
  "xlsx",
  "xls",
  "pptx",
  "ppt",
  "jpg",
  "jpeg",
  "png",
  "txt",
  "md",
] as const;

export const TARGET_FORMATS = [
  "pdf",
  "docx",
  "xlsx",
  "pptx",
  "jpg",
  "png",
  "scanned_pdf",
  "searchable_pdf",
] as const;

export type SourceFormat = (typeof SOURCE_FORMATS)[number];
export type TargetFormat = (typeof TARGET_FORMATS)[number];
export type Format = SourceFormat | TargetFormat;

export type Quality = 1 | 2 | 3;
export const DEFAULT_QUALITY: Quality = 2;

const OFFICE_TO_PDF: readonly TargetFormat[] = ["pdf"];
const IMAGE_TARGETS: readonly TargetFormat[] = ["pdf", "searchable_pdf"];

const VALID_TARGETS: Record<SourceFormat, ReadonlySet<TargetFormat>> = {
  pdf: new Set<TargetFormat>([
    "docx",
    "xlsx",
    "pptx",
    "jpg",
    "png",
    "scanned_pdf",
    "searchable_pdf",
  ]),
  jpg: new Set(IMAGE_TARGETS),
  jpeg: new Set(IMAGE_TARGETS),
  png: new Set(IMAGE_TARGETS),
  docx: new Set(OFFICE_TO_PDF),
  doc: new Set(OFFICE_TO_PDF),
  xlsx: new Set(OFFICE_TO_PDF),
  xls: new Set(OFFICE_TO_PDF),
  pptx: new Set(OFFICE_TO_PDF),
  ppt: new Set(OFFICE_TO_PDF),
  txt: new Set(OFFICE_TO_PDF),
  md: new Set(OFFICE_TO_PDF),
};

const MIME_TO_SOURCE: Record<string, SourceFormat> = {
  "application/pdf": "pdf",
  "application/vnd.openxmlformats-officedocument.wordprocessingml.document": "docx",
  "application/msword": "doc",
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet": "xlsx",
  "application/vnd.ms-excel": "xls",
  "application/vnd.openxmlformats-officedocument.presentationml.presentation": "pptx",
  "application/vnd.ms-powerpoint": "ppt",
  "image/jpeg": "jpg",
  "image/jpg": "jpg",
  "image/png": "png",
  "text/plain": "txt",
  "text/markdown": "md",
  "text/x-markdown": "md",
};

const TARGET_ALIASES: Record<string, TargetFormat> = {
  jpeg: "jpg",
  scannable_pdf: "scanned_pdf",
};

const CONTENT_TYPES: Record<string, string> = {
  pdf: "application/pdf",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  doc: "application/msword",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  xls: "application/vnd.ms-excel",
  pptx: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ppt: "application/vnd.ms-powerpoint",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  txt: "text/plain; charset=utf-8",
  md: "text/markdown; charset=utf-8",
  zip: "application/zip",
};

export function isQuality(value: unknown): value is Quality {
  return value === 1 || value === 2 || value === 3;
}

export function isSourceFormat(value: string): value is SourceFormat {
  return SOURCE_FORMATS.some((format) => format === value);
}

export function isTargetFormat(value: string): value is TargetFormat {
  return TARGET_FORMATS.some((format) => format === value);
}

/**
 * Reduce "Report.PDF", ".pdf", "pdf" or "application/pdf; x=y" to a bare
 * lowercase token.
 */
function normalizeToken(input: string): string {
  const trimmed = input.trim().toLowerCase();
  if (trimmed.includes("/")) {
    return trimmed.split(";")[0].trim();
  }
  const dot = trimmed.lastIndexOf(".");
  return dot === -1 ? trimmed : trimmed.slice(dot + 1);
}

/**
 * Resolve a file extension, filename or MIME type to a source format.
 */
export function resolveFormat(extensionOrMime: string): SourceFormat {
  const token = normalizeToken(extensionOrMime);
  if (token.includes("/")) {
    const fromMime = MIME_TO_SOURCE[token];
    if (fromMime) return fromMime;
  } else if (isSourceFormat(token)) {
    return token;
  }
  throw new UnsupportedFormatError(extensionOrMime.trim() || "(empty)");
}

/**
 * Resolve a requested target, accepting aliases such as `scannable_pdf`.
 */
export function resolveTargetFormat(value: string): TargetFormat {
  const token = value.trim().toLowerCase();
  const aliased = TARGET_ALIASES[token] ?? token;
  if (isTargetFormat(aliased)) return aliased;
  throw new UnsupportedFormatError(value.trim() || "(empty)");
}

export function validTargets(format: SourceFormat): ReadonlySet<TargetFormat> {
  return VALID_TARGETS[format];
}

export function isSupportedPair(from: SourceFormat, to: TargetFormat): boolean {
  return VALID_TARGETS[from].has(to);
}

export function assertSupportedPair(from: SourceFormat, to: TargetFormat): void {
  if (!isSupportedPair(from, to)) {
    throw new UnsupportedPairError(from, to);
  }
}

/** Every declared (from, to) pair, in registry order. */
export function supportedPairs(): Array<[SourceFormat, TargetFormat]> {
  const pairs: Array<[SourceFormat, TargetFormat]> = [];
  for (const from of SOURCE_FORMATS) {
    for (const to of TARGET_FORMATS) {
      if (VALID_TARGETS[from].has(to)) pairs.push([from, to]);
    }
  }
  return pairs;
}

export function listFormats(): Record<string, TargetFormat[]> {
  const out: Record<string, TargetFormat[]> = {};
  for (const from of SOURCE_FORMATS) {
    out[from] = TARGET_FORMATS.filter((to) => VALID_TARGETS[from].has(to));
  }
  return out;
}

/** File extension written for a target. PDF variants all produce `.pdf`. */
export function outputExtension(target: TargetFormat): string {
  return target === "scanned_pdf" || target === "searchable_pdf" ? "pdf" : target;
}

export function contentTypeFor(extension: string): string {
  return CONTENT_TYPES[extension.toLowerCase()] ?? "application/octet-stream";
}

/**
 * Parse the `quality` form field. Absent or blank means the default; anything
 * other than 1, 2 or 3 is null.
 */
export function parseQuality(value: string | undefined): Quality | null {
  if (value === undefined || value.trim() === "") return DEFAULT_QUALITY;
  switch (value.trim()) {
    case "1":
      return 1;
    case "2":
      return 2;
    case "3":
      return 3;
    default:
      return null;
  }
}
