export { isFileId, newFileId, parseDownloadId } from "./ids";
export type { DownloadId } from "./ids";
export { LifecycleManager } from "./manager";
export type { LifecycleOptions, NewJob, StoredUpload, SweepReport } from "./manager";
export { baseName, extensionOf, resolveOriginalName, sanitizeFileName } from "./names";
export { Sweeper } from "./sweeper";
