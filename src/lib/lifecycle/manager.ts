import type { ConversionOutput } from "../convert";
import { NotFoundError, type ServiceError } from "../errors";
import type { Quality, SourceFormat, TargetFormat } from "../formats";
import type { ConversionJob, FileStore, StoredFile } from "../store";
import { log } from "../utils/log";
import { isFileId, newFileId } from "./ids";
import { baseName, extensionOf, sanitizeFileName } from "./names";

export interface LifecycleOptions {
  retentionMs: number;
  now?: () => number;
}

export interface StoredUpload {
  fileId: string;
  /** Sanitized name the bytes were written under */
  storedName: string;
  file: StoredFile;
}

export interface NewJob {
  fileId: string;
  originalName: string;
  uploadedName: string;
  uploadName: string;
  from: SourceFormat;
  to: TargetFormat;
  quality: Quality;
}

export interface SweepReport {
  removedJobs: number;
  removedOrphans: number;
  failures: number;
}

/**
 * Owns ids, job records and expiry. Each job is touched only by the request
 * that created it, until the sweep removes it.
 */
export class LifecycleManager {
  private readonly now: () => number;

  constructor(
    private readonly store: FileStore,
    private readonly options: LifecycleOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  get retentionMs(): number {
    return this.options.retentionMs;
  }

  init(): Promise<void> {
    return this.store.init();
  }

  async storeUpload(data: Uint8Array, name: string): Promise<StoredUpload> {
    const fileId = newFileId();
    const storedName = sanitizeFileName(name, extensionOf(name) || "bin");
    const file = await this.store.putUpload(fileId, storedName, data);
    log.debug("lifecycle", `stored upload ${fileId} (${file.size} bytes)`);
    return { fileId, storedName, file };
  }

  uploadPath(fileId: string, storedName: string): string {
    return this.store.uploadPath(fileId, storedName);
  }

  resultDir(fileId: string): string {
    return this.store.resultDir(fileId);
  }

  /** Base name (no extension) results of this job are written under. */
  resultBaseName(job: ConversionJob): string {
    return sanitizeFileName(baseName(job.originalName), "bin");
  }

  async createJob(input: NewJob): Promise<ConversionJob> {
    const timestamp = this.now();
    const job: ConversionJob = {
      fileId: input.fileId,
      originalName: input.originalName,
      uploadedName: input.uploadedName,
      uploadName: input.uploadName,
      fromFormat: input.from,
      toFormat: input.to,
      quality: input.quality,
      status: "pending",
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    await this.store.writeJob(job);
    return job;
  }

  async markRunning(fileId: string): Promise<ConversionJob> {
    return this.update(fileId, (job) => ({ ...job, status: "running" }));
  }

  async recordResult(fileId: string, output: ConversionOutput): Promise<ConversionJob> {
    const resultName = output.path.split(/[\\/]/).pop() ?? "";
    const job = await this.update(fileId, (current) => ({
      ...current,
      status: "succeeded",
      resultName,
      resultSize: output.size,
      convertedAt: this.now(),
      error: undefined,
    }));
    log.info("lifecycle", `${fileId} succeeded -> ${resultName} (${output.size} bytes)`);
    return job;
  }

  /** Mark the job failed and drop anything it left in the results directory. */
  async markFailed(fileId: string, error: ServiceError): Promise<ConversionJob> {
    await this.store.clearResults(fileId);
    return this.update(fileId, (job) => ({
      ...job,
      status: "failed",
      resultName: undefined,
      resultSize: undefined,
      error: { code: error.code, message: error.message },
    }));
  }

  async getJob(fileId: string): Promise<ConversionJob | null> {
    if (!isFileId(fileId)) return null;
    return this.store.readJob(fileId);
  }

  /**
   * The finished result of a job, or null when the job is unknown, expired,
   * failed or still running.
   */
  async findResult(fileId: string): Promise<{ job: ConversionJob; file: StoredFile } | null> {
    const job = await this.getJob(fileId);
    if (!job || job.status !== "succeeded" || !job.resultName) return null;
    if (this.isExpired(job.createdAt)) return null;
    const file = await this.store.getResult(fileId, job.resultName);
    return file ? { job, file } : null;
  }

  isExpired(timestamp: number, now = this.now()): boolean {
    return timestamp < now - this.options.retentionMs;
  }

  /**
   * Delete every job created before the retention window, then any upload
   * or result directory left without metadata that is equally old.
   */
  async sweep(now = this.now()): Promise<SweepReport> {
    const report: SweepReport = { removedJobs: 0, removedOrphans: 0, failures: 0 };

    for (const listing of await this.store.listJobs()) {
      const reference = listing.job?.createdAt ?? listing.modifiedAt;
      if (!this.isExpired(reference, now)) continue;
      try {
        await this.store.remove(listing.fileId);
        report.removedJobs++;
      } catch (err) {
        report.failures++;
        log.error("sweeper", `failed to remove ${listing.fileId}`, err);
      }
    }

    const seen = new Set<string>();
    for (const orphan of await this.store.listOrphans()) {
      if (seen.has(orphan.fileId) || !this.isExpired(orphan.modifiedAt, now)) continue;
      seen.add(orphan.fileId);
      try {
        await this.store.remove(orphan.fileId);
        report.removedOrphans++;
      } catch (err) {
        report.failures++;
        log.error("sweeper", `failed to remove orphan ${orphan.fileId}`, err);
      }
    }

    if (report.removedJobs > 0 || report.removedOrphans > 0) {
      log.info(
        "sweeper",
        `removed ${report.removedJobs} expired jobs and ${report.removedOrphans} orphaned directories`,
      );
    }
    return report;
  }

  private async update(
    fileId: string,
    change: (job: ConversionJob) => ConversionJob,
  ): Promise<ConversionJob> {
    const current = await this.store.readJob(fileId);
    if (!current) throw new NotFoundError(`Job ${fileId} no longer exists`);
    const next = { ...change(current), updatedAt: this.now() };
    await this.store.writeJob(next);
    return next;
  }
}
