import { z } from "zod";
import { DEFAULT_DATA_DIR } from "../config/defaults.js";

export const DEFAULTS = {
  logging: {
    level: "info" as const,
    pretty: false,
  },
  storage: {
    backend: "filesystem" as const,
    filesystem: {
      root: DEFAULT_DATA_DIR,
    },
  },
  s3: {
    region: "us-east-1",
  },
};

export const StorageBackendKind = z.enum(["filesystem", "s3"]);

export const FilesystemStorageConfigSchema = z.object({
  root: z.string().min(1).default(DEFAULTS.storage.filesystem.root),
});

export const ObjectStoreConfigSchema = z.object({
  bucket: z
    .url({ protocol: /^https?$/ })
    .describe("Bucket endpoint, e.g. https://my-bucket.s3.amazonaws.com"),
  region: z.string().min(1).default(DEFAULTS.s3.region),
});

export const StorageConfigSchema = z.object({
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  storage: z
    .object({
      backend: StorageBackendKind.default(DEFAULTS.storage.backend),
      filesystem: FilesystemStorageConfigSchema.default(
        DEFAULTS.storage.filesystem,
      ),
      s3: ObjectStoreConfigSchema.optional(),
    })
    .default(DEFAULTS.storage),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type LoggingConfig = StorageConfig["logging"];
export type StorageSettings = StorageConfig["storage"];
export type ObjectStoreConfig = z.infer<typeof ObjectStoreConfigSchema>;
