import type { ErrorCode } from "../errors";
import type { Quality, SourceFormat, TargetFormat } from "../formats";

export type JobStatus = "pending" | "running" | "succeeded" | "failed";

export const JOB_STATUSES: readonly JobStatus[] = [
  "pending",
  "running",
  "succeeded",
  "failed",
];

/**
 * Metadata persisted beside each upload/result pair. Timestamps are epoch ms.
 */
export interface ConversionJob {
  fileId: string;
  /** Name the client knows the document by */
  originalName: string;
  /** Name of the multipart part as uploaded */
  uploadedName: string;
  /** Sanitized name the upload is stored under */
  uploadName: string;
  fromFormat: SourceFormat;
  toFormat: TargetFormat;
  quality: Quality;
  status: JobStatus;
  createdAt: number;
  updatedAt: number;
  resultName?: string;
  resultSize?: number;
  convertedAt?: number;
  error?: { code: ErrorCode; message: string };
}

export interface StoredFile {
  id: string;
  path: string;
  createdAt: number;
  size: number;
}

export interface JobListing {
  fileId: string;
  /** null when the metadata file exists but cannot be parsed */
  job: ConversionJob | null;
  modifiedAt: number;
}

/** An upload or result directory with no metadata next to it. */
export interface OrphanListing {
  fileId: string;
  kind: "upload" | "result";
  modifiedAt: number;
}

export interface DirectoryStatus {
  name: "uploads" | "results" | "metadata";
  path: string;
  exists: boolean;
  writable: boolean;
}

/**
 * Storage behind the lifecycle manager. File ids are always validated
 * before they reach an implementation.
 */
export interface FileStore {
  init(): Promise<void>;
  putUpload(fileId: string, fileName: string, data: Uint8Array): Promise<StoredFile>;
  uploadPath(fileId: string, fileName: string): string;
  resultDir(fileId: string): string;
  getResult(fileId: string, fileName: string): Promise<StoredFile | null>;
  clearResults(fileId: string): Promise<void>;
  writeJob(job: ConversionJob): Promise<void>;
  readJob(fileId: string): Promise<ConversionJob | null>;
  listJobs(): Promise<JobListing[]>;
  listOrphans(): Promise<OrphanListing[]>;
  /** Delete upload, result and metadata; metadata goes last. */
  remove(fileId: string): Promise<void>;
  checkDirectories(): Promise<DirectoryStatus[]>;
}
