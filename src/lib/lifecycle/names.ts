import * as path from "node:path";

const MAX_NAME_LENGTH = 180;

/**
 * Reduce a client-supplied file name to a single safe path segment. Unicode
 * letters are kept; separators, control and reserved characters are not.
 */
export function sanitizeFileName(name: string, fallbackExtension: string): string {
  const base = name.split(/[\\/]/).pop() ?? "";
  const cleaned = base
    .replace(/[\u0000-\u001f\u007f<>:"|?*]/g, "_")
    .replace(/^[.\s]+/, "")
    .replace(/[.\s]+$/, "")
    .trim();
  if (cleaned === "" || cleaned === "_") {
    return `upload.${fallbackExtension}`;
  }
  if (cleaned.length <= MAX_NAME_LENGTH) return cleaned;
  const ext = path.extname(cleaned).slice(0, 12);
  return `${cleaned.slice(0, MAX_NAME_LENGTH - ext.length)}${ext}`;
}

/** "report.final.pdf" -> "report.final" */
export function baseName(name: string): string {
  const ext = path.extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return stem || "document";
}

export function extensionOf(name: string): string {
  return path.extname(name).slice(1).toLowerCase();
}

/**
 * Pick the name a job is known by. A client-declared name wins, but its
 * extension is forced to match the file actually uploaded.
 */
export function resolveOriginalName(uploadedName: string, declared?: string): string {
  const trimmed = declared?.trim();
  if (!trimmed) return uploadedName;
  const uploadedExt = extensionOf(uploadedName);
  const declaredExt = extensionOf(trimmed);
  if (!uploadedExt || declaredExt === uploadedExt) return trimmed;
  const stem = declaredExt ? trimmed.slice(0, -(declaredExt.length + 1)) : trimmed;
  return `${stem}.${uploadedExt}`;
}
