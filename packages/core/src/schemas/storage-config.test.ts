import { describe, it, expect } from "vitest";
import { StorageConfigSchema } from "./storage-config.js";
import { DEFAULT_DATA_DIR } from "../config/defaults.js";

describe("StorageConfigSchema", () => {
  it("defaults to the filesystem backend under the data dir", () => {
    const config = StorageConfigSchema.parse({});

    expect(config.storage.backend).toBe("filesystem");
    expect(config.storage.filesystem.root).toBe(DEFAULT_DATA_DIR);
    expect(config.storage.s3).toBeUndefined();
    expect(config.logging).toEqual({ level: "info", pretty: false });
  });

  it("storage.s3.region defaults to us-east-1", () => {
    const config = StorageConfigSchema.parse({
      storage: {
        backend: "s3",
        s3: { bucket: "https://stowage-test.s3.amazonaws.com" },
      },
    });

    expect(config.storage.backend).toBe("s3");
    expect(config.storage.s3).toEqual({
      bucket: "https://stowage-test.s3.amazonaws.com",
      region: "us-east-1",
    });
  });

  it("fills filesystem defaults when only the backend is given", () => {
    const config = StorageConfigSchema.parse({
      storage: { backend: "filesystem" },
    });

    expect(config.storage.filesystem.root).toBe(DEFAULT_DATA_DIR);
  });

  it("rejects an unknown backend", () => {
    expect(() =>
      StorageConfigSchema.parse({ storage: { backend: "ftp" } }),
    ).toThrow();
  });

  it("rejects a bucket that is not an http(s) URL", () => {
    expect(() =>
      StorageConfigSchema.parse({
        storage: { backend: "s3", s3: { bucket: "not a url" } },
      }),
    ).toThrow();
    expect(() =>
      StorageConfigSchema.parse({
        storage: { backend: "s3", s3: { bucket: "ftp://bucket.example.com" } },
      }),
    ).toThrow();
  });

  it("rejects an unknown log level", () => {
    expect(() =>
      StorageConfigSchema.parse({ logging: { level: "verbose" } }),
    ).toThrow();
  });
});
