/**
 * S3-compatible object store backend.
 * PUT/GET against {bucket}/{path}, listing via GET {bucket}?prefix=...
 * Every request is SigV4-signed with credentials resolved at call time.
 */

import type { Readable } from "node:stream";
import type { Dispatcher } from "undici";
import type { Logger } from "pino";
import { createEnvCredentialSource } from "../../credentials/env.js";
import type { CredentialSource } from "../../credentials/types.js";
import { RemoteListError, RemoteReadError } from "../../errors/catalog.js";
import { createDispatcher, readText, send } from "../../http/transport.js";
import { createSilentLogger } from "../../logger/index.js";
import {
  createRequestSigner,
  type RequestSigner,
} from "../../signing/request-signer.js";
import type { ObjectWriter, StorageBackend, WalkFunc } from "./interface.js";
import { parseListing, type ListPage } from "./s3-listing.js";
import { BufferedObjectWriter } from "./s3-writer.js";

export interface S3BackendOptions {
  /** Scheme + host (+ optional bucket segment), e.g. https://my-bucket.s3.amazonaws.com */
  bucket: string;
  /** Defaults to AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY from the environment. */
  credentials?: CredentialSource;
  region?: string;
  /** Replaces the signer built from credentials and region. */
  signer?: RequestSigner;
  /** Defaults to an agent with keep-alive disabled. */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export interface S3Backend extends StorageBackend {
  readonly bucket: string;
  /**
   * One listing call. The store caps a page at 1000 entries; no
   * continuation request is made, so `isTruncated` is the only sign of
   * entries left out.
   */
  listPage(prefix: string): Promise<ListPage>;
}

/** "/a/b" → "a/b/", "a/b//" → "a/b/", "" → "/" */
export function normalizePrefix(prefix: string): string {
  return `${prefix.replace(/^\/+/, "").replace(/\/+$/, "")}/`;
}

export function createS3Backend(options: S3BackendOptions): S3Backend {
  const { bucket } = options;
  const signer =
    options.signer ??
    createRequestSigner({
      credentials: options.credentials ?? createEnvCredentialSource(),
      ...(options.region !== undefined ? { region: options.region } : {}),
    });
  const dispatcher = options.dispatcher ?? createDispatcher();
  const logger = (options.logger ?? createSilentLogger()).child({
    backend: "s3",
    bucket,
  });

  async function listPage(prefix: string): Promise<ListPage> {
    const normalized = normalizePrefix(prefix);
    const req = await signer.sign("GET", bucket, "", undefined, {
      prefix: normalized,
    });
    logger.debug({ prefix: normalized }, "Listing objects");

    const res = await send(dispatcher, req);
    const body = await readText(res);
    if (res.statusCode !== 200) {
      logger.warn({ prefix: normalized, statusCode: res.statusCode }, "Listing rejected");
      throw new RemoteListError(res.statusCode, body);
    }

    const page = parseListing(body);
    if (page.isTruncated) {
      logger.warn(
        { prefix: normalized, returned: page.entries.length },
        "Listing truncated; remaining entries are not fetched",
      );
    }
    return page;
  }

  return {
    bucket,

    async save(path: string): Promise<ObjectWriter> {
      signer.assertCredentials();
      return new BufferedObjectWriter({ bucket, path, signer, dispatcher, logger });
    },

    async fetch(path: string): Promise<Readable> {
      const req = await signer.sign("GET", bucket, path);
      logger.debug({ path }, "Fetching object");

      const res = await send(dispatcher, req);
      if (res.statusCode !== 200) {
        // Possibly a huge object: close without reading
        res.body.destroy();
        logger.warn({ path, statusCode: res.statusCode }, "Object fetch rejected");
        throw new RemoteReadError(res.statusCode);
      }
      return res.body;
    },

    async walk(prefix: string, visit: WalkFunc): Promise<void> {
      const page = await listPage(prefix);
      for (const entry of page.entries) {
        await visit(entry.key, null);
      }
    },

    listPage,
  };
}
