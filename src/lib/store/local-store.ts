import * as fs from "node:fs";
import * as path from "node:path";
import type { StoragePaths } from "../config/service-config";
import { MetaStore } from "./meta-store";
import type {
  ConversionJob,
  DirectoryStatus,
  FileStore,
  JobListing,
  OrphanListing,
  StoredFile,
} from "./types";

async function listDirs(root: string): Promise<Array<{ name: string; modifiedAt: number }>> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(root, { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
  const dirs: Array<{ name: string; modifiedAt: number }> = [];
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    try {
      const stat = await fs.promises.stat(path.join(root, entry.name));
      dirs.push({ name: entry.name, modifiedAt: stat.mtimeMs });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== "ENOENT") throw err;
    }
  }
  return dirs;
}

async function checkDir(dir: string): Promise<{ exists: boolean; writable: boolean }> {
  try {
    const stat = await fs.promises.stat(dir);
    if (!stat.isDirectory()) return { exists: false, writable: false };
  } catch {
    return { exists: false, writable: false };
  }
  try {
    await fs.promises.access(dir, fs.constants.W_OK);
    return { exists: true, writable: true };
  } catch {
    return { exists: true, writable: false };
  }
}

/**
 * Files on local disk, one directory per file id:
 *
 *   uploads/<id>/<name>   results/<id>/<name>   metadata/<id>.json
 */
export class LocalFileStore implements FileStore {
  private readonly meta: MetaStore;

  constructor(private readonly paths: Pick<StoragePaths, "uploads" | "results" | "metadata">) {
    this.meta = new MetaStore(paths.metadata);
  }

  async init(): Promise<void> {
    await fs.promises.mkdir(this.paths.uploads, { recursive: true });
    await fs.promises.mkdir(this.paths.results, { recursive: true });
    await this.meta.init();
  }

  uploadPath(fileId: string, fileName: string): string {
    return path.join(this.paths.uploads, fileId, fileName);
  }

  resultDir(fileId: string): string {
    return path.join(this.paths.results, fileId);
  }

  async putUpload(fileId: string, fileName: string, data: Uint8Array): Promise<StoredFile> {
    const target = this.uploadPath(fileId, fileName);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    // "wx" refuses to overwrite: ids are never reused.
    await fs.promises.writeFile(target, data, { flag: "wx" });
    const stat = await fs.promises.stat(target);
    return { id: fileId, path: target, createdAt: stat.mtimeMs, size: stat.size };
  }

  async getResult(fileId: string, fileName: string): Promise<StoredFile | null> {
    const target = path.join(this.resultDir(fileId), fileName);
    try {
      const stat = await fs.promises.stat(target);
      if (!stat.isFile()) return null;
      return { id: fileId, path: target, createdAt: stat.mtimeMs, size: stat.size };
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
      throw err;
    }
  }

  async clearResults(fileId: string): Promise<void> {
    await fs.promises.rm(this.resultDir(fileId), { recursive: true, force: true });
  }

  writeJob(job: ConversionJob): Promise<void> {
    return this.meta.write(job);
  }

  readJob(fileId: string): Promise<ConversionJob | null> {
    return this.meta.read(fileId);
  }

  listJobs(): Promise<JobListing[]> {
    return this.meta.list();
  }

  async listOrphans(): Promise<OrphanListing[]> {
    const known = new Set((await this.meta.list()).map((listing) => listing.fileId));
    const orphans: OrphanListing[] = [];
    for (const dir of await listDirs(this.paths.uploads)) {
      if (!known.has(dir.name)) orphans.push({ fileId: dir.name, kind: "upload", modifiedAt: dir.modifiedAt });
    }
    for (const dir of await listDirs(this.paths.results)) {
      if (!known.has(dir.name)) orphans.push({ fileId: dir.name, kind: "result", modifiedAt: dir.modifiedAt });
    }
    return orphans;
  }

  async remove(fileId: string): Promise<void> {
    await fs.promises.rm(path.join(this.paths.uploads, fileId), { recursive: true, force: true });
    await fs.promises.rm(this.resultDir(fileId), { recursive: true, force: true });
    await this.meta.delete(fileId);
  }

  async checkDirectories(): Promise<DirectoryStatus[]> {
    const entries: Array<[DirectoryStatus["name"], string]> = [
      ["uploads", this.paths.uploads],
      ["results", this.paths.results],
      ["metadata", this.paths.metadata],
    ];
    const statuses: DirectoryStatus[] = [];
    for (const [name, dir] of entries) {
      statuses.push({ name, path: dir, ...(await checkDir(dir)) });
    }
    return statuses;
  }
}
