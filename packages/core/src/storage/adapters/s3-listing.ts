/**
 * Parsing of ListObjects (ListBucketResult) XML bodies.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { ParseError } from "../../errors/catalog.js";

/** The store returns at most this many entries per listing call. */
export const MAX_KEYS_PER_PAGE = 1000;

export interface ListEntry {
  key: string;
  lastModified: Date;
  size: number;
}

export interface ListPage {
  entries: ListEntry[];
  /** True when the store had more entries than it returned. */
  isTruncated: boolean;
}

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  // Keys may begin or end with whitespace
  trimValues: false,
  isArray: (_name, jpath) => jpath === "ListBucketResult.Contents",
});

const ContentsSchema = z.object({
  Key: z.string(),
  LastModified: z.string().transform((value, ctx) => {
    const date = new Date(value);
    if (Number.isNaN(date.getTime())) {
      ctx.addIssue({ code: "custom", message: `Invalid LastModified: ${value}` });
      return z.NEVER;
    }
    return date;
  }),
  // Past 2^53 a Number cannot hold the exact size
  Size: z
    .string()
    .regex(/^\d+$/, "Size must be a non-negative integer")
    .transform(Number)
    .refine(Number.isSafeInteger, "Size exceeds the largest safe integer"),
});

const ListBucketResultSchema = z.object({
  ListBucketResult: z.preprocess(
    // An element without children parses to its (possibly blank) text
    (value) => (typeof value === "string" && value.trim() === "" ? {} : value),
    z.object({
      IsTruncated: z.string().optional(),
      Contents: z.array(ContentsSchema).default([]),
    }),
  ),
});

/** Entries in document order. Throws ParseError on malformed or unexpected XML. */
export function parseListing(xml: string): ListPage {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new ParseError(`Invalid listing XML: ${valid.err.msg}`, {
      line: valid.err.line,
      col: valid.err.col,
    });
  }

  const result = ListBucketResultSchema.safeParse(parser.parse(xml));
  if (!result.success) {
    throw new ParseError(
      `Unexpected listing document: ${result.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`).join("; ")}`,
    );
  }

  const listing = result.data.ListBucketResult;
  return {
    entries: listing.Contents.map((c) => ({
      key: c.Key,
      lastModified: c.LastModified,
      size: c.Size,
    })),
    isTruncated: listing.IsTruncated === "true",
  };
}
