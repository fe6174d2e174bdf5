/**
 * Response body decompression.
 *
 * Bodies are requested with "Accept-Encoding: gzip, deflate" and arrive
 * undecoded. A body that does not match its declared Content-Encoding is
 * kept as-is; a truncated stream yields whatever prefix could be inflated.
 * Either way the caller gets bytes to parse plus a diagnostic.
 */

import {
  constants,
  gunzipSync,
  inflateRawSync,
  inflateSync,
  type ZlibOptions,
} from "node:zlib";
import { diagnostics, type BozoDiagnostic } from "../diagnostics";

export type ContentCoding = "gzip" | "deflate";

export interface DecompressedBody {
  bytes: Buffer;
  diagnostic?: BozoDiagnostic;
}

type Inflater = (body: Buffer, options?: ZlibOptions) => Buffer;

/**
 * Maps a Content-Encoding header value to a supported coding. Unknown
 * codings (and "identity") return undefined and the body passes through.
 */
export function parseContentCoding(header: string | undefined): ContentCoding | undefined {
  const coding = header?.trim().toLowerCase();
  if (coding === "gzip" || coding === "x-gzip") {
    return "gzip";
  }
  if (coding === "deflate") {
    return "deflate";
  }
  return undefined;
}

function zlibErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

type InflateAttempt =
  | { ok: true; bytes: Buffer; truncated: boolean }
  | { ok: false; error: unknown };

/**
 * Inflates a complete stream, or the recoverable prefix of one that ends
 * early. Other zlib errors are returned, not thrown.
 */
function attemptInflate(inflate: Inflater, body: Buffer, recoverTruncated: boolean): InflateAttempt {
  try {
    return { ok: true, bytes: inflate(body), truncated: false };
  } catch (error) {
    if (!recoverTruncated || zlibErrorCode(error) !== "Z_BUF_ERROR") {
      return { ok: false, error };
    }
  }

  try {
    return {
      ok: true,
      bytes: inflate(body, { finishFlush: constants.Z_SYNC_FLUSH }),
      truncated: true,
    };
  } catch (error) {
    return { ok: false, error };
  }
}

function toResult(
  attempt: Extract<InflateAttempt, { ok: true }>,
  coding: ContentCoding
): DecompressedBody {
  if (attempt.truncated) {
    return {
      bytes: attempt.bytes,
      diagnostic: diagnostics.compressionTruncated(coding, attempt.bytes.length),
    };
  }
  return { bytes: attempt.bytes };
}

/**
 * Decodes a response body according to its Content-Encoding header.
 *
 * @example
 * const { bytes, diagnostic } = decompressBody(body, headers.get("content-encoding"));
 */
export function decompressBody(body: Buffer, contentEncoding: string | undefined): DecompressedBody {
  const coding = parseContentCoding(contentEncoding);
  if (!coding || body.length === 0) {
    return { bytes: body };
  }

  if (coding === "gzip") {
    const attempt = attemptInflate(gunzipSync, body, true);
    if (attempt.ok) {
      return toResult(attempt, coding);
    }
    return {
      bytes: body,
      diagnostic: diagnostics.compressionMismatch(coding, errorMessage(attempt.error)),
    };
  }

  // "deflate" is zlib-wrapped per RFC 9110, but many servers send raw deflate
  const wrapped = attemptInflate(inflateSync, body, true);
  if (wrapped.ok) {
    return toResult(wrapped, coding);
  }
  const raw = attemptInflate(inflateRawSync, body, false);
  if (raw.ok) {
    return toResult(raw, coding);
  }
  return {
    bytes: body,
    diagnostic: diagnostics.compressionMismatch(coding, errorMessage(wrapped.error)),
  };
}
