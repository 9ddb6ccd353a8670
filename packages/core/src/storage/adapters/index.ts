export type {
  ObjectWriter,
  WalkFunc,
  Saver,
  Fetcher,
  Walker,
  StorageBackend,
} from "./interface.js";
export {
  createS3Backend,
  normalizePrefix,
  type S3Backend,
  type S3BackendOptions,
} from "./s3.js";
export {
  BufferedObjectWriter,
  type BufferedObjectWriterOptions,
} from "./s3-writer.js";
export {
  parseListing,
  MAX_KEYS_PER_PAGE,
  type ListEntry,
  type ListPage,
} from "./s3-listing.js";
export {
  createFilesystemBackend,
  type FilesystemBackend,
  type FilesystemBackendOptions,
} from "./filesystem.js";
