import { createReadStream, type Dirent, type Stats } from "node:fs";
import { mkdir, open, readdir, stat, type FileHandle } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import type { Readable } from "node:stream";
import type { Logger } from "pino";
import { InvalidPathError, NotFoundError } from "../../errors/catalog.js";
import { createSilentLogger } from "../../logger/index.js";
import type { ObjectWriter, StorageBackend, WalkFunc } from "./interface.js";

export interface FilesystemBackendOptions {
  /** Directory object paths are resolved against. */
  root: string;
  logger?: Logger;
}

export interface FilesystemBackend extends StorageBackend {
  readonly root: string;
  /**
   * Every object at `path`: the file itself, or each file below it
   * (recursively, in key order) when `path` is a directory.
   */
  fetchAll(path: string): AsyncGenerator<Readable>;
}

function isNotFound(err: unknown): boolean {
  return (
    err instanceof Error &&
    "code" in err &&
    (err.code === "ENOENT" || err.code === "ENOTDIR")
  );
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

class FileObjectWriter implements ObjectWriter {
  private closed = false;

  constructor(private readonly handle: FileHandle) {}

  async write(chunk: Uint8Array | string): Promise<number> {
    const data = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
    let offset = 0;
    while (offset < data.byteLength) {
      const { bytesWritten } = await this.handle.write(data, offset);
      offset += bytesWritten;
    }
    return data.byteLength;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

export function createFilesystemBackend(
  options: FilesystemBackendOptions,
): FilesystemBackend {
  const { root } = options;
  const logger = (options.logger ?? createSilentLogger()).child({
    backend: "filesystem",
    root,
  });

  const base = resolve(root);

  /** Throws InvalidPathError when ".." segments lead outside the root. */
  function resolveKey(path: string): string {
    const file = resolve(base, ...path.split("/").filter((segment) => segment !== ""));
    const rel = relative(base, file);
    if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new InvalidPathError(path);
    }
    return file;
  }

  function toKey(file: string): string {
    return relative(base, file).split(sep).join("/");
  }

  async function fileInfo(file: string): Promise<Stats | undefined> {
    try {
      return await stat(file);
    } catch (err: unknown) {
      if (isNotFound(err)) return undefined;
      throw err;
    }
  }

  /** Depth-first, entries sorted by name; unreadable directories go to visit(). */
  async function walkDir(dir: string, visit: WalkFunc): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err: unknown) {
      await visit(toKey(dir), toError(err));
      return;
    }

    for (const entry of entries.sort(byName)) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walkDir(full, visit);
      } else if (entry.isFile()) {
        await visit(toKey(full), null);
      }
    }
  }

  return {
    root,

    async save(path: string): Promise<ObjectWriter> {
      const file = resolveKey(path);
      await mkdir(dirname(file), { recursive: true });
      const handle = await open(file, "w");
      logger.debug({ path }, "Opened object for writing");
      return new FileObjectWriter(handle);
    },

    async fetch(path: string): Promise<Readable> {
      const file = resolveKey(path);
      const info = await fileInfo(file);
      if (!info?.isFile()) {
        throw new NotFoundError(path);
      }
      return createReadStream(file);
    },

    async *fetchAll(path: string): AsyncGenerator<Readable> {
      const file = resolveKey(path);
      const info = await fileInfo(file);
      if (info?.isFile()) {
        yield createReadStream(file);
        return;
      }
      if (!info?.isDirectory()) {
        throw new NotFoundError(path);
      }

      const keys: string[] = [];
      await walkDir(file, (key, err) => {
        if (err) throw err;
        keys.push(key);
      });
      for (const key of keys) {
        yield createReadStream(resolveKey(key));
      }
    },

    async walk(prefix: string, visit: WalkFunc): Promise<void> {
      const start = resolveKey(prefix);
      let info: Stats | undefined;
      try {
        info = await fileInfo(start);
      } catch (err: unknown) {
        await visit(toKey(start), toError(err));
        return;
      }

      if (info === undefined) return;
      if (info.isFile()) {
        await visit(toKey(start), null);
        return;
      }
      await walkDir(start, visit);
    },
  };
}
