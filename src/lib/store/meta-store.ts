import * as fs from "node:fs";
import * as path from "node:path";
import { isQuality, isSourceFormat, isTargetFormat } from "../formats";
import { ERROR_CODES } from "../errors";
import { log } from "../utils/log";
import { type ConversionJob, JOB_STATUSES, type JobListing, type JobStatus } from "./types";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined;
}

/**
 * Validate a parsed metadata file. Anything that does not look like a job
 * written by this service yields null.
 */
export function parseJob(raw: unknown): ConversionJob | null {
  if (!isRecord(raw)) return null;
  const {
    fileId,
    originalName,
    uploadedName,
    uploadName,
    fromFormat,
    toFormat,
    quality,
    status,
    createdAt,
    updatedAt,
  } = raw;
  if (
    typeof fileId !== "string" ||
    typeof originalName !== "string" ||
    typeof uploadedName !== "string" ||
    typeof uploadName !== "string" ||
    typeof fromFormat !== "string" ||
    !isSourceFormat(fromFormat) ||
    typeof toFormat !== "string" ||
    !isTargetFormat(toFormat) ||
    !isQuality(quality) ||
    typeof status !== "string" ||
    typeof createdAt !== "number" ||
    typeof updatedAt !== "number"
  ) {
    return null;
  }
  const jobStatus = JOB_STATUSES.find((s): s is JobStatus => s === status);
  if (!jobStatus) return null;

  const job: ConversionJob = {
    fileId,
    originalName,
    uploadedName,
    uploadName,
    fromFormat,
    toFormat,
    quality,
    status: jobStatus,
    createdAt,
    updatedAt,
  };
  if (typeof raw.resultName === "string") job.resultName = raw.resultName;
  const resultSize = optionalNumber(raw.resultSize);
  if (resultSize !== undefined) job.resultSize = resultSize;
  const convertedAt = optionalNumber(raw.convertedAt);
  if (convertedAt !== undefined) job.convertedAt = convertedAt;
  if (isRecord(raw.error) && typeof raw.error.message === "string") {
    const rawCode = raw.error.code;
    const code = ERROR_CODES.find((c) => c === rawCode);
    job.error = { code: code ?? "InternalError", message: raw.error.message };
  }
  return job;
}

/**
 * One JSON file per job under the metadata directory. Writes go through a
 * temp file and a rename so a crash never leaves a half-written record.
 */
export class MetaStore {
  constructor(private readonly dir: string) {}

  async init(): Promise<void> {
    await fs.promises.mkdir(this.dir, { recursive: true });
  }

  pathFor(fileId: string): string {
    return path.join(this.dir, `${fileId}.json`);
  }

  async write(job: ConversionJob): Promise<void> {
    const target = this.pathFor(job.fileId);
    const tmpFile = `${target}.tmp`;
    await fs.promises.mkdir(this.dir, { recursive: true });
    await fs.promises.writeFile(tmpFile, JSON.stringify(job, null, 2), "utf-8");
    await fs.promises.rename(tmpFile, target);
  }

  async read(fileId: string): Promise<ConversionJob | null> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.pathFor(fileId), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
    try {
      return parseJob(JSON.parse(content));
    } catch {
      log.warn("meta-store", `unreadable metadata for ${fileId}`);
      return null;
    }
  }

  async list(): Promise<JobListing[]> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.dir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
      throw err;
    }

    const complete = new Set(
      names.filter((name) => name.endsWith(".json")).map((name) => name.slice(0, -".json".length)),
    );
    const listings: JobListing[] = [];
    for (const name of names) {
      const match = /^(.+)\.json(\.tmp)?$/.exec(name);
      if (!match) continue;
      const [, fileId, tmp] = match;
      // A .tmp with no finished record is debris from an interrupted write.
      if (tmp && complete.has(fileId)) continue;
      try {
        const stat = await fs.promises.stat(path.join(this.dir, name));
        const job = tmp ? null : await this.read(fileId);
        listings.push({ fileId, job, modifiedAt: stat.mtimeMs });
      } catch (err) {
        if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
      }
    }
    return listings;
  }

  async delete(fileId: string): Promise<void> {
    const target = this.pathFor(fileId);
    await fs.promises.rm(target, { force: true });
    await fs.promises.rm(`${target}.tmp`, { force: true });
  }
}
