import type { Readable } from "node:stream";

/**
 * Sink for one object. Nothing is guaranteed to be stored until close()
 * resolves; closing again is a no-op.
 */
export interface ObjectWriter {
  /** Resolves with the number of bytes accepted. */
  write(chunk: Uint8Array | string): Promise<number>;
  close(): Promise<void>;
}

/**
 * Called once per object found by walk(). `err` reports a failure for
 * that entry; the object store backend always passes null.
 */
export type WalkFunc = (key: string, err: Error | null) => void | Promise<void>;

export interface Saver {
  save(path: string): Promise<ObjectWriter>;
}

export interface Fetcher {
  /** The caller owns the stream and must consume or destroy it. */
  fetch(path: string): Promise<Readable>;
}

export interface Walker {
  walk(prefix: string, visit: WalkFunc): Promise<void>;
}

/**
 * Abstract storage backend.
 * Keys are "/"-separated paths relative to the backend root or bucket.
 */
export interface StorageBackend extends Saver, Fetcher, Walker {}
