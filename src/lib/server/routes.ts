import * as fs from "node:fs";
import type { IncomingMessage, ServerResponse } from "node:http";
import { pipeline } from "node:stream/promises";
import { API_VERSION } from "../../config";
import { NotFoundError, toServiceError, ValidationError } from "../errors";
import {
  assertSupportedPair,
  contentTypeFor,
  listFormats,
  outputExtension,
  parseQuality,
  resolveFormat,
  resolveTargetFormat,
  type SourceFormat,
} from "../formats";
import { baseName, extensionOf, parseDownloadId, resolveOriginalName } from "../lifecycle";
import { log } from "../utils/log";
import { checkContentLength, parseMultipart, readBody, type UploadedFile } from "./multipart";
import { probeTools } from "./probe";
import {
  contentDisposition,
  formatTimestamp,
  NO_CACHE_HEADERS,
  sendJson,
} from "./responses";
import type { Service } from "./service";

export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  service: Service,
  params: string[],
) => Promise<void>;

export const ENDPOINTS = {
  formats: "GET /api/formats",
  convert: "POST /api/convert",
  download: "GET /api/download/{file_id}",
  system_check: "GET /api/system-check",
  health: "GET /health",
};

export const handleIndex: RouteHandler = async (_req, res) => {
  sendJson(res, 200, { status: "running", api_version: API_VERSION, endpoints: ENDPOINTS });
};

export const handleHealth: RouteHandler = async (_req, res) => {
  sendJson(res, 200, { status: "ok" });
};

export const handleFormats: RouteHandler = async (_req, res) => {
  sendJson(res, 200, listFormats());
};

export const handleSystemCheck: RouteHandler = async (_req, res, service) => {
  const [directories, tools] = await Promise.all([
    service.store.checkDirectories(),
    probeTools(service.runner, service.config.tools),
  ]);
  const healthy =
    directories.every((d) => d.exists && d.writable) && tools.every((t) => t.available);
  sendJson(res, 200, {
    status: healthy ? "ok" : "degraded",
    api_version: API_VERSION,
    directories,
    tools,
    limits: {
      max_upload_bytes: service.config.maxUploadBytes,
      max_concurrent_conversions: service.config.maxConcurrentConversions,
      tool_timeout_ms: service.config.toolTimeoutMs,
      retention_hours: service.config.retentionMs / 3_600_000,
    },
  });
};

/**
 * Explicit field first, then the file name's extension, then the part's
 * declared MIME type.
 */
export function inferSourceFormat(explicit: string | undefined, upload: UploadedFile): SourceFormat {
  const ext = extensionOf(upload.name);
  if (explicit && explicit.trim() !== "") {
    const from = resolveFormat(explicit);
    if (ext && ext !== from) {
      log.debug("convert", `from_format ${from} overrides extension .${ext}`);
    }
    return from;
  }
  const candidates = [ext, upload.type].filter((token) => token !== "");
  let firstError: unknown;
  for (const token of candidates) {
    try {
      return resolveFormat(token);
    } catch (err) {
      firstError ??= err;
    }
  }
  throw firstError ?? new ValidationError("Cannot determine the format of the uploaded file");
}

export const handleConvert: RouteHandler = async (req, res, service) => {
  const { config, lifecycle, dispatcher } = service;
  checkContentLength(req, config.maxUploadBytes);
  const body = await readBody(req, config.maxUploadBytes);
  const form = await parseMultipart(body, req.headers["content-type"]);

  const upload = form.files.get("file");
  if (!upload) throw new ValidationError("No file provided");
  if (upload.name.trim() === "") throw new ValidationError("No file selected");
  if (upload.data.byteLength === 0) throw new ValidationError("Uploaded file is empty");

  const toField = form.fields.get("to_format");
  if (!toField || toField.trim() === "") throw new ValidationError("to_format is required");
  const quality = parseQuality(form.fields.get("quality"));
  if (quality === null) throw new ValidationError("quality must be 1, 2 or 3");

  const from = inferSourceFormat(form.fields.get("from_format"), upload);
  const to = resolveTargetFormat(toField);
  assertSupportedPair(from, to);

  const stored = await lifecycle.storeUpload(upload.data, upload.name);
  const { fileId } = stored;
  const job = await lifecycle.createJob({
    fileId,
    originalName: resolveOriginalName(upload.name, form.fields.get("original_filename")),
    uploadedName: upload.name,
    uploadName: stored.storedName,
    from,
    to,
    quality,
  });
  await lifecycle.markRunning(fileId);

  const output = await dispatcher
    .convert({
      inputPath: stored.file.path,
      from,
      to,
      quality,
      outputDir: lifecycle.resultDir(fileId),
      outputBaseName: lifecycle.resultBaseName(job),
    })
    .catch(async (err: unknown) => {
      const failure = toServiceError(err);
      await lifecycle.markFailed(fileId, failure);
      throw failure;
    });

  const done = await lifecycle.recordResult(fileId, output);
  sendJson(res, 200, {
    success: true,
    file_id: fileId,
    original_name: done.originalName,
    from_format: from,
    to_format: outputExtension(to),
    file_size: output.size,
    result_url: `/api/download/${fileId}.${output.extension}`,
    converted_time: formatTimestamp(done.convertedAt ?? done.updatedAt),
  });
};

export const handleDownload: RouteHandler = async (_req, res, service, params) => {
  const id = parseDownloadId(params[0] ?? "");
  if (!id) throw new NotFoundError();

  const found = await service.lifecycle.findResult(id.fileId);
  if (!found) throw new NotFoundError();
  const extension = extensionOf(found.file.path);
  if (id.extension && id.extension !== extension) throw new NotFoundError();

  const downloadName = `${baseName(found.job.originalName)}.${extension}`;
  res.statusCode = 200;
  res.setHeader("Content-Type", contentTypeFor(extension));
  res.setHeader("Content-Length", found.file.size);
  res.setHeader("Content-Disposition", contentDisposition(downloadName));
  for (const [name, value] of Object.entries(NO_CACHE_HEADERS)) {
    res.setHeader(name, value);
  }
  await pipeline(fs.createReadStream(found.file.path), res);
};
