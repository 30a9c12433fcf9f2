export { LocalFileStore } from "./local-store";
export { MetaStore, parseJob } from "./meta-store";
export type {
  ConversionJob,
  DirectoryStatus,
  FileStore,
  JobListing,
  JobStatus,
  OrphanListing,
  StoredFile,
} from "./types";
