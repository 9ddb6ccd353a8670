/**
 * RequestSigner: builds object URLs and SigV4-signs requests against a
 * bucket endpoint. Used by the S3 backend for every operation.
 */

import { Mutex } from "async-mutex";
import type { CredentialSource } from "../credentials/types.js";
import { RequestConstructionError } from "../errors/catalog.js";
import { canonicalQueryString, encodePath } from "./canonical.js";
import { signV4 } from "./sigv4.js";

export const HTTP_METHODS = ["GET", "HEAD", "PUT", "POST", "DELETE"] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.some((m) => m === method);
}

/** A request ready to send once. Never cached or reused. */
export interface SignedRequest {
  method: HttpMethod;
  url: URL;
  headers: Record<string, string>;
  body?: Uint8Array;
}

export interface RequestSigner {
  /** Throws ConfigurationError when credentials are unavailable. */
  assertCredentials(): void;
  sign(
    method: string,
    bucket: string,
    objectPath: string,
    body?: Uint8Array,
    query?: Record<string, string>,
  ): Promise<SignedRequest>;
}

export interface RequestSignerOptions {
  credentials: CredentialSource;
  /** Default "us-east-1". */
  region?: string;
  /** Default "s3". */
  service?: string;
  now?: () => Date;
}

/**
 * Joins endpoint and path, adding a "/" only when the path is non-empty
 * and neither side already provides one.
 */
export function fullPath(bucket: string, path: string): string {
  if (path.length > 0 && !path.startsWith("/") && !bucket.endsWith("/")) {
    return `${bucket}/${path}`;
  }
  return bucket + path;
}

export function buildObjectUrl(
  bucket: string,
  objectPath: string,
  query: Record<string, string> = {},
): { url: URL; query: string } {
  // The URL parser would resolve these (even percent-encoded) into another key
  if (objectPath.split("/").some((segment) => segment === "." || segment === "..")) {
    throw new RequestConstructionError(
      `Object path must not contain "." or ".." segments: ${JSON.stringify(objectPath)}`,
      { bucket, path: objectPath },
    );
  }

  let url: URL;
  try {
    url = new URL(fullPath(bucket, encodePath(objectPath)));
  } catch (err: unknown) {
    throw new RequestConstructionError(
      `Cannot build request URL from ${JSON.stringify(bucket)} and ${JSON.stringify(objectPath)}`,
      { bucket, path: objectPath, reason: err instanceof Error ? err.message : String(err) },
    );
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new RequestConstructionError(
      `Unsupported bucket endpoint scheme: ${url.protocol}`,
      { bucket },
    );
  }

  const canonicalQuery = canonicalQueryString(query);
  url.search = canonicalQuery;
  url.hash = "";
  return { url, query: canonicalQuery };
}

export function createRequestSigner(
  options: RequestSignerOptions,
): RequestSigner {
  const scope = {
    region: options.region ?? "us-east-1",
    service: options.service ?? "s3",
  };
  const now = options.now ?? (() => new Date());
  // Held only while the signature is computed, never across the HTTP exchange
  const signing = new Mutex();

  return {
    assertCredentials(): void {
      options.credentials.resolve();
    },

    async sign(method, bucket, objectPath, body, query): Promise<SignedRequest> {
      const credentials = options.credentials.resolve();

      if (!isHttpMethod(method)) {
        throw new RequestConstructionError(`Invalid method: ${method}`, {
          method,
        });
      }
      const target = buildObjectUrl(bucket, objectPath, query);

      const headers = await signing.runExclusive(() =>
        signV4(
          { method, url: target.url, query: target.query, headers: {}, body },
          credentials,
          scope,
          now(),
        ),
      );

      return {
        method,
        url: target.url,
        headers,
        ...(body !== undefined ? { body } : {}),
      };
    },
  };
}
