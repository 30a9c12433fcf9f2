import type { IncomingMessage } from "node:http";
import type { Readable } from "node:stream";
import { PayloadTooLargeError, ValidationError } from "../errors";

export interface UploadedFile {
  name: string;
  /** MIME type the client declared for the part, possibly empty */
  type: string;
  data: Uint8Array;
}

export interface MultipartForm {
  fields: Map<string, string>;
  files: Map<string, UploadedFile>;
}

/**
 * Reject early when the client announces a body over the limit.
 */
export function checkContentLength(req: IncomingMessage, limitBytes: number): void {
  const declared = Number(req.headers["content-length"]);
  if (Number.isFinite(declared) && declared > limitBytes) {
    throw new PayloadTooLargeError(limitBytes);
  }
}

/**
 * Buffer a request body, failing once it grows past `limitBytes`. The rest
 * of an oversized body is read and discarded so the 413 can still be sent.
 */
export function readBody(stream: Readable, limitBytes: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let overflowed = false;

    stream.on("data", (chunk: Buffer | string) => {
      if (overflowed) return;
      const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      size += buf.length;
      if (size > limitBytes) {
        overflowed = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(limitBytes));
        return;
      }
      chunks.push(buf);
    });
    stream.on("end", () => {
      if (!overflowed) resolve(Buffer.concat(chunks));
    });
    stream.on("error", reject);
  });
}

/**
 * Decode a multipart/form-data body with the runtime's own form parser.
 */
export async function parseMultipart(
  body: Buffer,
  contentType: string | undefined,
): Promise<MultipartForm> {
  if (!contentType || !/^multipart\/form-data\s*;/i.test(contentType)) {
    throw new ValidationError("Request must be multipart/form-data");
  }

  const form = await new Response(body, { headers: { "content-type": contentType } })
    .formData()
    .catch(() => {
      throw new ValidationError("Malformed multipart body");
    });

  const fields = new Map<string, string>();
  const files = new Map<string, UploadedFile>();
  for (const [key, entry] of form.entries()) {
    if (typeof entry === "string") {
      if (!fields.has(key)) fields.set(key, entry);
      continue;
    }
    if (files.has(key)) continue;
    files.set(key, {
      name: entry.name,
      type: entry.type,
      data: new Uint8Array(await entry.arrayBuffer()),
    });
  }
  return { fields, files };
}
