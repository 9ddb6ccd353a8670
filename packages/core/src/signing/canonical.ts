/**
 * Canonical request construction for AWS Signature Version 4 (S3 flavour).
 *
 * S3 does not normalize object paths, so each segment is encoded exactly
 * once and runs of slashes are kept as they are.
 */

/** RFC 3986 encoding: everything except A-Z a-z 0-9 - _ . ~ is escaped. */
export function uriEncode(input: string): string {
  return encodeURIComponent(input).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/** Encode an object path segment by segment, keeping "/" separators. */
export function encodePath(path: string): string {
  return path.split("/").map(uriEncode).join("/");
}

/**
 * Sorted, encoded query string. The same string is used on the wire so the
 * signed and sent forms cannot drift apart.
 */
export function canonicalQueryString(query: Record<string, string>): string {
  return Object.entries(query)
    .map(([key, value]) => [uriEncode(key), uriEncode(value)] as const)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${key}=${value}`)
    .join("&");
}

/** Lowercase names, sorted, values trimmed with inner whitespace collapsed. */
export function canonicalHeaders(headers: Record<string, string>): string {
  return (
    Object.entries(headers)
      .map(([name, value]) => [name.toLowerCase(), value.trim().replace(/\s+/g, " ")])
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, value]) => `${name}:${value}`)
      .join("\n") + "\n"
  );
}

export function signedHeaders(headers: Record<string, string>): string {
  return Object.keys(headers)
    .map((name) => name.toLowerCase())
    .sort()
    .join(";");
}

/**
 * METHOD\nURI\nQUERY\nHEADERS\n\nSIGNED_HEADERS\nPAYLOAD_HASH
 * (the blank line comes from the trailing newline of the header block).
 */
export function createCanonicalRequest(
  method: string,
  pathname: string,
  query: string,
  headers: Record<string, string>,
  payloadHash: string,
): string {
  return [
    method.toUpperCase(),
    pathname === "" ? "/" : pathname,
    query,
    canonicalHeaders(headers),
    signedHeaders(headers),
    payloadHash,
  ].join("\n");
}
