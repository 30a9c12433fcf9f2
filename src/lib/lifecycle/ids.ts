import { v4 as uuidv4, validate, version } from "uuid";

export function newFileId(): string {
  return uuidv4();
}

export function isFileId(value: string): boolean {
  return validate(value) && version(value) === 4 && value === value.toLowerCase();
}

const DOWNLOAD_ID = /^([0-9a-f-]{36})(?:\.([a-z0-9]{1,10}))?$/;

export interface DownloadId {
  fileId: string;
  extension?: string;
}

/**
 * Accepts `<uuid>` or `<uuid>.<ext>` and nothing else. Anything that could
 * address a path (separators, dots, percent-escapes) fails here.
 */
export function parseDownloadId(raw: string): DownloadId | null {
  const match = DOWNLOAD_ID.exec(raw);
  if (!match || !isFileId(match[1])) return null;
  return match[2] ? { fileId: match[1], extension: match[2] } : { fileId: match[1] };
}
