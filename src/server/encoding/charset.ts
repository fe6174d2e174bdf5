/**
 * Charset name helpers.
 */

import * as iconv from "iconv-lite";

const ALIASES: Record<string, string> = {
  utf8: "utf-8",
  "unicode-1-1-utf-8": "utf-8",
  "x-unicode20utf8": "utf-8",
  ascii: "us-ascii",
  latin1: "iso-8859-1",
  "x-sjis": "shift_jis",
  "x-euc-jp": "euc-jp",
};

/**
 * Normalizes a charset label: trims quotes and whitespace, lowercases, and
 * maps common aliases ("utf8", "latin1") to their canonical names.
 */
export function normalizeCharset(label: string): string {
  const name = label
    .trim()
    .replace(/^["']|["']$/g, "")
    .trim()
    .toLowerCase();
  return ALIASES[name] ?? name;
}

function compact(label: string): string {
  return normalizeCharset(label).replace(/[^a-z0-9]/g, "");
}

const EBCDIC_NAMES = new Set([
  "cp037",
  "ibm037",
  "csibm037",
  "ebcdiccpus",
  "ebcdiccpca",
  "cp500",
  "ibm500",
  "ebcdic",
]);

/**
 * Whether two labels name the same encoding, or encodings from the same
 * family that differ only in byte order ("utf-16" and "utf-16le").
 */
export function isSameCharsetFamily(a: string, b: string): boolean {
  const left = compact(a);
  const right = compact(b);
  if (left === right) {
    return true;
  }
  for (const family of ["utf16", "utf32", "ucs2", "ucs4"]) {
    if (left.startsWith(family) && right.startsWith(family)) {
      return true;
    }
  }
  if (EBCDIC_NAMES.has(left) && EBCDIC_NAMES.has(right)) {
    return true;
  }
  // ASCII is a strict subset of UTF-8
  const asciiLike = new Set(["usascii", "utf8"]);
  return asciiLike.has(left) && asciiLike.has(right);
}

/**
 * Whether a charset can be decoded in this runtime.
 */
export function isCharsetSupported(label: string): boolean {
  const name = normalizeCharset(label);
  return name === "utf-8" || iconv.encodingExists(name);
}

/**
 * Extracts the charset parameter from a Content-Type header value.
 *
 * @example
 * charsetFromContentType('application/rss+xml; charset="ISO-8859-1"'); // "iso-8859-1"
 */
export function charsetFromContentType(contentType: string | undefined): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const match = /;\s*charset\s*=\s*("[^"]*"|'[^']*'|[^;\s]+)/i.exec(contentType);
  if (!match) {
    return undefined;
  }
  const charset = normalizeCharset(match[1]);
  return charset || undefined;
}

/**
 * Extracts the media type from a Content-Type header value, lowercased and
 * without parameters.
 */
export function mediaTypeFromContentType(contentType: string | undefined): string | undefined {
  if (!contentType) {
    return undefined;
  }
  const mediaType = contentType.split(";")[0].trim().toLowerCase();
  return mediaType || undefined;
}
