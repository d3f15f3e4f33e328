export {
  DEFAULT_CHANGESET_CAPACITY,
  chunk,
  getChangesetCapacity,
  deleteElements,
  uploadElements,
  type BatchOptions,
  type UploadResult,
} from "./batches.js";
export {
  mirrorArea,
  exportArea,
  type DonorFetcher,
  type ConfirmDeletion,
  type DonorOptions,
  type MirrorOptions,
  type MirrorResult,
  type ExportOptions,
  type ExportResult,
} from "./mirror.js";
