import { createHash, createHmac } from "node:crypto";
import type { Credentials } from "../credentials/types.js";
import { createCanonicalRequest, signedHeaders } from "./canonical.js";

export const ALGORITHM = "AWS4-HMAC-SHA256";

// SHA256 of empty string is a well-known constant
export const EMPTY_SHA256 =
  "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

export interface SigningScope {
  region: string;
  service: string;
}

export interface SigningInput {
  method: string;
  url: URL;
  /** Canonical (already encoded) query string, without "?". */
  query: string;
  headers: Record<string, string>;
  body?: Uint8Array;
}

export function sha256Hex(data: Uint8Array | string): string {
  return createHash("sha256").update(data).digest("hex");
}

function hmac(key: Uint8Array | string, data: string): Buffer {
  return createHmac("sha256", key).update(data, "utf-8").digest();
}

export function hashPayload(body?: Uint8Array): string {
  return body && body.byteLength > 0 ? sha256Hex(body) : EMPTY_SHA256;
}

/** 2024-01-15T10:30:00.123Z → 20240115T103000Z */
export function formatAmzDate(date: Date): string {
  return date.toISOString().replace(/[-:]/g, "").replace(/\.\d{3}/, "");
}

export function deriveSigningKey(
  secretAccessKey: string,
  dateStamp: string,
  scope: SigningScope,
): Buffer {
  const dateKey = hmac(`AWS4${secretAccessKey}`, dateStamp);
  const regionKey = hmac(dateKey, scope.region);
  const serviceKey = hmac(regionKey, scope.service);
  return hmac(serviceKey, "aws4_request");
}

/**
 * Returns the input headers plus host, x-amz-date, x-amz-content-sha256,
 * x-amz-security-token (temporary credentials only) and authorization.
 */
export function signV4(
  input: SigningInput,
  credentials: Credentials,
  scope: SigningScope,
  now: Date,
): Record<string, string> {
  const amzDate = formatAmzDate(now);
  const dateStamp = amzDate.slice(0, 8);
  const payloadHash = hashPayload(input.body);

  const headers: Record<string, string> = {
    ...input.headers,
    host: input.url.host,
    "x-amz-content-sha256": payloadHash,
    "x-amz-date": amzDate,
  };
  if (credentials.sessionToken) {
    headers["x-amz-security-token"] = credentials.sessionToken;
  }

  const canonicalRequest = createCanonicalRequest(
    input.method,
    input.url.pathname,
    input.query,
    headers,
    payloadHash,
  );

  const credentialScope = `${dateStamp}/${scope.region}/${scope.service}/aws4_request`;
  const stringToSign = [
    ALGORITHM,
    amzDate,
    credentialScope,
    sha256Hex(canonicalRequest),
  ].join("\n");

  const signature = createHmac(
    "sha256",
    deriveSigningKey(credentials.secretAccessKey, dateStamp, scope),
  )
    .update(stringToSign, "utf-8")
    .digest("hex");

  headers.authorization = [
    `${ALGORITHM} Credential=${credentials.accessKeyId}/${credentialScope}`,
    `SignedHeaders=${signedHeaders(headers)}`,
    `Signature=${signature}`,
  ].join(", ");

  return headers;
}
