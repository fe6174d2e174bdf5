/**
 * Cache validator utilities.
 * Pure functions for building conditional request headers and reading the
 * validators a response carries.
 */

import {
  fromDate,
  isCanonicalTimestamp,
  isTimestampTuple,
  toDate,
  fromTuple,
  type CanonicalTimestamp,
  type TimestampTuple,
} from "../dates/timestamp";
import type { HeaderMap } from "../http/headers";

/**
 * A Last-Modified validator as the caller has it: the header string from a
 * previous response, a calendar value, or a Date.
 */
export type ModifiedValidator = string | Date | CanonicalTimestamp | TimestampTuple;

/**
 * Validators read from a response.
 */
export interface ParsedCacheHeaders {
  /** ETag header value */
  etag?: string;
  /** Last-Modified header value (as string, to preserve original format) */
  lastModified?: string;
}

/**
 * Serializes a validator to RFC 1123 wire format
 * ("Thu, 01 Jan 2004 19:48:21 GMT"). Strings are sent as given.
 *
 * @returns The header value, or undefined if the calendar value is invalid
 *
 * @example
 * formatHttpDate([2004, 1, 1, 19, 48, 21, 3, 1, 0]);
 * // => "Thu, 01 Jan 2004 19:48:21 GMT"
 */
export function formatHttpDate(modified: ModifiedValidator): string | undefined {
  if (typeof modified === "string") {
    return modified;
  }

  let timestamp: CanonicalTimestamp | undefined;
  if (modified instanceof Date) {
    timestamp = isNaN(modified.getTime()) ? undefined : fromDate(modified);
  } else if (isTimestampTuple(modified)) {
    timestamp = fromTuple(modified);
  } else if (isCanonicalTimestamp(modified)) {
    timestamp = modified;
  }

  return timestamp ? toDate(timestamp).toUTCString() : undefined;
}

/**
 * Builds If-None-Match / If-Modified-Since headers for a conditional GET.
 */
export function buildConditionalHeaders(validators: {
  etag?: string;
  modified?: ModifiedValidator;
}): Record<string, string> {
  const headers: Record<string, string> = {};

  if (validators.etag) {
    headers["If-None-Match"] = validators.etag;
  }

  if (validators.modified !== undefined) {
    const lastModified = formatHttpDate(validators.modified);
    if (lastModified) {
      headers["If-Modified-Since"] = lastModified;
    }
  }

  return headers;
}

/**
 * Parses the cache validators from an HTTP response.
 *
 * @param headers - The HTTP response headers
 */
export function parseCacheHeaders(headers: HeaderMap): ParsedCacheHeaders {
  return {
    etag: headers.get("etag"),
    lastModified: headers.get("last-modified"),
  };
}
