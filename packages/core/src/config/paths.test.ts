import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";
import {
  expandHomePath,
  resolveRootPath,
  resolveStorageRoot,
} from "./paths.js";

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/backups/stowage")).toBe(
      resolve(homedir(), "backups/stowage"),
    );
  });

  it("leaves other paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
    expect(expandHomePath("~other/dir")).toBe("~other/dir");
  });
});

describe("resolveRootPath", () => {
  it("returns default root path when no input is provided", () => {
    expect(resolveRootPath()).toBe(resolve(DEFAULT_ROOT_PATH));
  });

  it("resolves relative paths to absolute", () => {
    expect(resolveRootPath("relative/stowage")).toBe(
      resolve("relative/stowage"),
    );
  });
});

describe("resolveStorageRoot", () => {
  it("expands home and resolves to an absolute path", () => {
    expect(resolveStorageRoot("~/objects")).toBe(resolve(homedir(), "objects"));
    expect(resolveStorageRoot("/srv/objects/")).toBe("/srv/objects");
  });
});
