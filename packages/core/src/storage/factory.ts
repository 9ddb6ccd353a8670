import type { Dispatcher } from "undici";
import type { Logger } from "pino";
import type { CredentialSource } from "../credentials/types.js";
import { ConfigurationError } from "../errors/catalog.js";
import type { StorageSettings } from "../schemas/storage-config.js";
import { createFilesystemBackend } from "./adapters/filesystem.js";
import type { StorageBackend } from "./adapters/interface.js";
import { createS3Backend } from "./adapters/s3.js";

export interface StorageBackendDeps {
  logger?: Logger;
  /** S3 only; defaults to the environment. */
  credentials?: CredentialSource;
  /** S3 only; defaults to an agent with keep-alive disabled. */
  dispatcher?: Dispatcher;
}

/** Builds the backend named by `storage.backend`. */
export function createStorageBackend(
  settings: StorageSettings,
  deps: StorageBackendDeps = {},
): StorageBackend {
  switch (settings.backend) {
    case "filesystem":
      return createFilesystemBackend({
        root: settings.filesystem.root,
        ...(deps.logger ? { logger: deps.logger } : {}),
      });
    case "s3":
      if (!settings.s3) {
        throw new ConfigurationError(
          'storage.s3 must be set when storage.backend is "s3"',
        );
      }
      return createS3Backend({
        bucket: settings.s3.bucket,
        region: settings.s3.region,
        ...deps,
      });
  }
}
