import { describe, it, expect } from "vitest";
import { ParseError } from "../../errors/catalog.js";
import { parseListing } from "./s3-listing.js";

const TWO_ENTRIES = `<?xml version="1.0" encoding="UTF-8"?>
<ListBucketResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">
  <Name>stowage-test</Name>
  <Prefix>mongotooltest/</Prefix>
  <MaxKeys>1000</MaxKeys>
  <IsTruncated>false</IsTruncated>
  <Contents>
    <Key>mongotooltest/b</Key>
    <LastModified>2024-01-15T10:30:00.000Z</LastModified>
    <ETag>&quot;acbd18db4cc2f85cedef654fccc4a4d8&quot;</ETag>
    <Size>3</Size>
    <StorageClass>STANDARD</StorageClass>
  </Contents>
  <Contents>
    <Key>mongotooltest/a</Key>
    <LastModified>2024-01-16T08:00:00.000Z</LastModified>
    <ETag>&quot;d41d8cd98f00b204e9800998ecf8427e&quot;</ETag>
    <Size>0</Size>
    <StorageClass>STANDARD</StorageClass>
  </Contents>
</ListBucketResult>`;

describe("parseListing", () => {
  it("returns entries in document order", () => {
    const page = parseListing(TWO_ENTRIES);

    expect(page.isTruncated).toBe(false);
    expect(page.entries).toEqual([
      {
        key: "mongotooltest/b",
        lastModified: new Date("2024-01-15T10:30:00.000Z"),
        size: 3,
      },
      {
        key: "mongotooltest/a",
        lastModified: new Date("2024-01-16T08:00:00.000Z"),
        size: 0,
      },
    ]);
  });

  it("returns a single entry as a one-element list", () => {
    const page = parseListing(
      "<ListBucketResult><IsTruncated>true</IsTruncated><Contents>" +
        "<Key>only</Key><LastModified>2024-01-15T10:30:00Z</LastModified><Size>12</Size>" +
        "</Contents></ListBucketResult>",
    );

    expect(page.isTruncated).toBe(true);
    expect(page.entries.map((e) => e.key)).toEqual(["only"]);
    expect(page.entries[0]?.size).toBe(12);
  });

  it("decodes XML entities in keys", () => {
    const page = parseListing(
      "<ListBucketResult><Contents><Key>a&amp;b&lt;c</Key>" +
        "<LastModified>2024-01-15T10:30:00Z</LastModified><Size>1</Size>" +
        "</Contents></ListBucketResult>",
    );

    expect(page.entries[0]?.key).toBe("a&b<c");
  });

  it("keeps leading and trailing whitespace in keys", () => {
    const page = parseListing(
      "<ListBucketResult><Contents><Key> spaced key </Key>" +
        "<LastModified>2024-01-15T10:30:00Z</LastModified><Size>1</Size>" +
        "</Contents><Contents><Key>\ttabbed\t</Key>" +
        "<LastModified>2024-01-15T10:30:00Z</LastModified><Size>2</Size>" +
        "</Contents></ListBucketResult>",
    );

    expect(page.entries.map((e) => e.key)).toEqual([" spaced key ", "\ttabbed\t"]);
  });

  it("keeps numeric-looking keys as strings", () => {
    const page = parseListing(
      "<ListBucketResult><Contents><Key>007</Key>" +
        "<LastModified>2024-01-15T10:30:00Z</LastModified><Size>1</Size>" +
        "</Contents></ListBucketResult>",
    );

    expect(page.entries[0]?.key).toBe("007");
  });

  it("returns no entries for an empty listing", () => {
    expect(parseListing("<ListBucketResult/>")).toEqual({
      entries: [],
      isTruncated: false,
    });
    expect(
      parseListing("<ListBucketResult><Name>stowage-test</Name></ListBucketResult>")
        .entries,
    ).toEqual([]);
  });

  it("treats a whitespace-only listing as empty", () => {
    expect(parseListing("<ListBucketResult>\n  </ListBucketResult>").entries).toEqual(
      [],
    );
  });

  it("throws ParseError for malformed XML", () => {
    expect(() => parseListing("<ListBucketResult><Contents>")).toThrow(
      ParseError,
    );
  });

  it("throws ParseError for a document that is not a listing", () => {
    expect(() =>
      parseListing("<Error><Code>AccessDenied</Code></Error>"),
    ).toThrow(ParseError);
  });

  it("throws ParseError for an invalid size or date", () => {
    expect(() =>
      parseListing(
        "<ListBucketResult><Contents><Key>k</Key>" +
          "<LastModified>2024-01-15T10:30:00Z</LastModified><Size>-1</Size>" +
          "</Contents></ListBucketResult>",
      ),
    ).toThrow(ParseError);
    expect(() =>
      parseListing(
        "<ListBucketResult><Contents><Key>k</Key>" +
          "<LastModified>yesterday</LastModified><Size>1</Size>" +
          "</Contents></ListBucketResult>",
      ),
    ).toThrow("Invalid LastModified: yesterday");
  });

  it("rejects sizes a Number cannot represent exactly", () => {
    const listing = (size: string) =>
      "<ListBucketResult><Contents><Key>k</Key>" +
      `<LastModified>2024-01-15T10:30:00Z</LastModified><Size>${size}</Size>` +
      "</Contents></ListBucketResult>";

    expect(parseListing(listing("9007199254740991")).entries[0]?.size).toBe(
      Number.MAX_SAFE_INTEGER,
    );
    expect(() => parseListing(listing("9007199254740993"))).toThrow(
      "Size exceeds the largest safe integer",
    );
  });
});
