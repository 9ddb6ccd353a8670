/**
 * In-process stand-in for an S3 bucket, served through undici's MockAgent.
 * Objects live in a Map; listings follow ListObjects (1000 keys a page).
 */

import { MockAgent } from "undici";

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Record<string, string>;
  body?: Buffer;
}

export interface FakeObjectStore {
  readonly agent: MockAgent;
  readonly objects: Map<string, Buffer>;
  readonly requests: RecordedRequest[];
  /** Status returned instead of the normal answer, with its body. */
  failNext(method: string, statusCode: number, body?: string): void;
  close(): Promise<void>;
}

const PAGE_SIZE = 1000;

function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

export function listBucketResultXml(
  keys: string[],
  sizes: (key: string) => number,
  isTruncated: boolean,
): string {
  const contents = keys
    .map(
      (key) =>
        `<Contents><Key>${escapeXml(key)}</Key>` +
        "<LastModified>2024-01-15T10:30:00.000Z</LastModified>" +
        `<ETag>&quot;etag&quot;</ETag><Size>${sizes(key)}</Size>` +
        "<StorageClass>STANDARD</StorageClass></Contents>",
    )
    .join("");
  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    '<ListBucketResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">' +
    `<Name>fake</Name><MaxKeys>${PAGE_SIZE}</MaxKeys>` +
    `<IsTruncated>${isTruncated}</IsTruncated>${contents}</ListBucketResult>`
  );
}

function toBuffer(body: unknown): Buffer | undefined {
  if (body === undefined || body === null) return undefined;
  if (typeof body === "string") return Buffer.from(body, "utf-8");
  if (body instanceof Uint8Array) return Buffer.from(body);
  return undefined;
}

function toHeaders(headers: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (headers instanceof Headers) {
    headers.forEach((value, name) => {
      out[name.toLowerCase()] = value;
    });
  } else if (typeof headers === "object" && headers !== null) {
    for (const [name, value] of Object.entries(headers)) {
      if (typeof value === "string") out[name.toLowerCase()] = value;
    }
  }
  return out;
}

/** `endpoint` is a host-style bucket URL such as https://bucket.example.com */
export function createFakeObjectStore(endpoint: string): FakeObjectStore {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const origin = new URL(endpoint).origin;
  const pool = agent.get(origin);

  const objects = new Map<string, Buffer>();
  const requests: RecordedRequest[] = [];
  const failures = new Map<string, { statusCode: number; body: string }>();

  function keyOf(path: string): string {
    return decodeURIComponent(new URL(path, origin).pathname.slice(1));
  }

  function failure(method: string) {
    const planned = failures.get(method);
    if (planned) failures.delete(method);
    return planned;
  }

  pool
    .intercept({ path: () => true, method: "PUT" })
    .reply((opts) => {
      const body = toBuffer(opts.body) ?? Buffer.alloc(0);
      requests.push({ method: "PUT", path: opts.path, headers: toHeaders(opts.headers), body });
      const planned = failure("PUT");
      if (planned) return { statusCode: planned.statusCode, data: planned.body };

      objects.set(keyOf(opts.path), body);
      return { statusCode: 200, data: "" };
    })
    .persist();

  pool
    .intercept({ path: () => true, method: "GET" })
    .reply((opts) => {
      requests.push({ method: "GET", path: opts.path, headers: toHeaders(opts.headers) });
      const planned = failure("GET");
      if (planned) return { statusCode: planned.statusCode, data: planned.body };

      const url = new URL(opts.path, origin);
      const prefix = url.searchParams.get("prefix");
      if (url.pathname === "/" && prefix !== null) {
        const matching = [...objects.keys()]
          .filter((key) => key.startsWith(prefix))
          .sort();
        const page = matching.slice(0, PAGE_SIZE);
        return {
          statusCode: 200,
          data: listBucketResultXml(
            page,
            (key) => objects.get(key)?.byteLength ?? 0,
            matching.length > PAGE_SIZE,
          ),
        };
      }

      const object = objects.get(keyOf(opts.path));
      if (!object) {
        return {
          statusCode: 404,
          data: "<Error><Code>NoSuchKey</Code><Message>The specified key does not exist.</Message></Error>",
        };
      }
      return { statusCode: 200, data: object };
    })
    .persist();

  return {
    agent,
    objects,
    requests,
    failNext(method, statusCode, body = "") {
      failures.set(method, { statusCode, body });
    },
    close: () => agent.close(),
  };
}
