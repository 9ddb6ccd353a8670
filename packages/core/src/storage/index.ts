export * from "./adapters/index.js";
export { createStorageBackend, type StorageBackendDeps } from "./factory.js";
