export { FileSystemSource, FileSystemStorage, type FileSystemStorageOptions } from "./filesystem.ts";
export {
  DEFAULT_MANIFEST_NAME,
  type Manifest,
  MANIFEST_VERSION,
  ManifestSchema,
  ManifestStorage,
  type ManifestStorageOptions,
} from "./manifest.ts";
export type {
  ModifiedFileEntry,
  ModifiedFileRecord,
  PostProcessOptions,
  PostProcessResult,
  SourceLocation,
  StorageBackend,
} from "./types.ts";
