export {
  DEFAULTS,
  StorageBackendKind,
  FilesystemStorageConfigSchema,
  ObjectStoreConfigSchema,
  StorageConfigSchema,
  type StorageConfig,
  type LoggingConfig,
  type StorageSettings,
  type ObjectStoreConfig,
} from "./storage-config.js";
