import type { Dispatcher } from "undici";
import type { Logger } from "pino";
import { RemoteWriteError } from "../../errors/catalog.js";
import { discard, readText, send } from "../../http/transport.js";
import type { RequestSigner } from "../../signing/request-signer.js";
import type { ObjectWriter } from "./interface.js";

export interface BufferedObjectWriterOptions {
  bucket: string;
  path: string;
  signer: RequestSigner;
  dispatcher: Dispatcher;
  logger: Logger;
}

/**
 * Holds every written byte in memory and sends the whole object as one
 * signed PUT on close(). The store needs the content length up front, so
 * the object is never streamed; large objects cost their size in memory.
 */
export class BufferedObjectWriter implements ObjectWriter {
  private chunks: Buffer[] = [];
  private buffered = 0;
  private closed = false;

  constructor(private readonly options: BufferedObjectWriterOptions) {}

  /** Bytes waiting to be sent. */
  get size(): number {
    return this.buffered;
  }

  async write(chunk: Uint8Array | string): Promise<number> {
    // Copy: the caller may reuse its buffer before close()
    const bytes =
      typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk);
    this.chunks.push(bytes);
    this.buffered += bytes.byteLength;
    return bytes.byteLength;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const { bucket, path, signer, dispatcher, logger } = this.options;
    const payload = Buffer.concat(this.chunks, this.buffered);
    // Dropped whatever the outcome: a failed upload is never resent
    this.chunks = [];
    this.buffered = 0;

    const req = await signer.sign("PUT", bucket, path, payload);
    logger.debug({ path, bytes: payload.byteLength }, "Uploading object");

    const res = await send(dispatcher, req);
    if (res.statusCode !== 200) {
      const body = await readText(res);
      logger.warn({ path, statusCode: res.statusCode }, "Object upload rejected");
      throw new RemoteWriteError(res.statusCode, body);
    }
    await discard(res);
  }
}
