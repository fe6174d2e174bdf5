/**
 * Feed engine.
 *
 * Runs one parse invocation through its phases:
 *
 *   fetching -> decoding -> parsing_strict -> [parsing_fallback] -> done
 *
 * Every anomaly along the way is recorded as a diagnostic and sets `bozo`;
 * none of them stops the invocation from producing a result. The only
 * exception that escapes is a FeedSourceError for a local file that cannot
 * be read.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import type { Dispatcher } from "undici";
import { createParseLogger, type Logger } from "../../lib/logger";
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from "../config/env";
import { normalizeDate as defaultNormalizeDate, type DateNormalizer } from "../dates/normalizer";
import { mediaTypeFromContentType } from "../encoding/charset";
import { resolveEncoding } from "../encoding/resolver";
import { HeaderMap, type HeaderInit } from "../http/headers";
import { parseCacheHeaders, type ModifiedValidator } from "./cache-headers";
import { diagnostics, type BozoDiagnostic } from "../diagnostics";
import { FeedSourceError } from "./errors";
import { fetchFeed } from "./fetcher";
import { parseLenient, parseStrict, type StructuralParseOptions } from "./parser";
import type { MappedFeed, ParseResult } from "./types";

// ============================================================================
// Types
// ============================================================================

/**
 * What can be parsed: an http(s) URL, a file: URL or local path, or the
 * document itself.
 */
export type FeedSource = string | URL | Buffer | Uint8Array;

export interface ParseOptions {
  /** ETag from a previous response, sent as If-None-Match */
  etag?: string;
  /** Last-Modified from a previous response, sent as If-Modified-Since */
  modified?: ModifiedValidator;
  /** Extra request headers; they override the defaults */
  requestHeaders?: HeaderInit;
  /** Overrides for this invocation's configuration */
  config?: EngineConfigOverrides;
  /** undici dispatcher for HTTP sources */
  dispatcher?: Dispatcher;
  /** Date normalizer for every date field (default: the built-in recognizers) */
  normalizeDate?: DateNormalizer;
}

export type EnginePhase = "fetching" | "decoding" | "parsing_strict" | "parsing_fallback" | "done";

type ClassifiedSource =
  | { kind: "url"; url: string }
  | { kind: "file"; path: string }
  | { kind: "bytes"; bytes: Buffer }
  | { kind: "text"; text: string };

/**
 * State carried through the phases of one invocation.
 */
interface Invocation {
  readonly config: EngineConfig;
  readonly log: Logger;
  readonly result: ParseResult;
  readonly normalizeDate: DateNormalizer;
  phase: EnginePhase;
}

// ============================================================================
// Source handling
// ============================================================================

const XML_MEDIA_TYPES = new Set([
  "application/xml",
  "application/xml-dtd",
  "application/xml-external-parsed-entity",
  "text/xml",
  "text/xml-external-parsed-entity",
]);

/**
 * Whether a media type is one of the XML types (including any "+xml"
 * suffix type such as application/atom+xml).
 */
export function isXmlMediaType(mediaType: string): boolean {
  return XML_MEDIA_TYPES.has(mediaType) || mediaType.endsWith("+xml");
}

/**
 * Decides what kind of source was given. A string is a URL if it has an
 * http(s) or file scheme, a path if it has neither markup nor a newline,
 * and a document otherwise.
 */
export function classifySource(source: FeedSource): ClassifiedSource {
  if (source instanceof URL) {
    if (source.protocol === "file:") {
      return { kind: "file", path: fileURLToPath(source) };
    }
    return { kind: "url", url: source.toString() };
  }

  if (typeof source === "string") {
    if (/^https?:\/\//i.test(source)) {
      return { kind: "url", url: source };
    }
    if (/^file:/i.test(source)) {
      return { kind: "file", path: fileURLToPath(source) };
    }
    if (!source.includes("<") && !source.includes("\n")) {
      return { kind: "file", path: source };
    }
    return { kind: "text", text: source };
  }

  return { kind: "bytes", bytes: Buffer.from(source) };
}

function describeSource(source: ClassifiedSource): string {
  switch (source.kind) {
    case "url":
      return source.url;
    case "file":
      return source.path;
    case "bytes":
      return `<${source.bytes.length} bytes>`;
    case "text":
      return `<${source.text.length} characters>`;
  }
}

async function readLocalSource(path: string): Promise<Buffer> {
  try {
    return await readFile(path);
  } catch (error) {
    const code =
      error instanceof Error && "code" in error && typeof error.code === "string"
        ? error.code
        : "UNKNOWN";
    throw new FeedSourceError(path, code, error);
  }
}

// ============================================================================
// Phases
// ============================================================================

function enter(invocation: Invocation, phase: EnginePhase): void {
  invocation.phase = phase;
  invocation.log.debug("Parse phase", { phase });
}

function record(invocation: Invocation, diagnostic: BozoDiagnostic): void {
  invocation.result.diagnostics.push(diagnostic);
  invocation.log.warn("Feed anomaly", {
    phase: invocation.phase,
    code: diagnostic.code,
    message: diagnostic.message,
  });
}

function finish(invocation: Invocation): ParseResult {
  enter(invocation, "done");
  const { result } = invocation;
  result.bozo = result.diagnostics.length > 0;
  result.bozoException = result.diagnostics[0];
  invocation.log.debug("Parse finished", {
    version: result.version,
    entries: result.entries.length,
    bozo: result.bozo,
  });
  return result;
}

/**
 * Fetches an HTTP source. Returns the body to decode, or undefined when the
 * invocation is already complete (not modified, or a transport failure).
 */
async function fetchPhase(
  invocation: Invocation,
  url: string,
  options: ParseOptions
): Promise<{ bytes: Buffer; charset?: string } | undefined> {
  const { config, result } = invocation;
  const outcome = await fetchFeed(url, {
    etag: options.etag,
    modified: options.modified,
    extraHeaders: options.requestHeaders,
    userAgent: config.userAgent,
    timeoutMs: config.timeoutMs,
    maxRedirects: config.maxRedirects,
    maxSizeBytes: config.maxSizeBytes,
    dispatcher: options.dispatcher,
  });

  result.href = outcome.finalUrl;

  switch (outcome.kind) {
    case "transport_error":
      record(invocation, outcome.diagnostic);
      return undefined;

    case "redirected":
      result.status = outcome.status;
      record(invocation, outcome.diagnostic);
      return undefined;

    case "not_modified":
    case "fresh": {
      result.status = outcome.status;
      result.headers = outcome.headers;
      const cache = parseCacheHeaders(outcome.headers);
      result.etag = cache.etag;
      result.modified = cache.lastModified;
      result.updated = invocation.normalizeDate(cache.lastModified);

      if (outcome.kind === "not_modified") {
        return undefined;
      }

      for (const diagnostic of outcome.diagnostics) {
        record(invocation, diagnostic);
      }

      const contentType = outcome.raw.contentType;
      result.contentType = contentType;
      const mediaType = mediaTypeFromContentType(contentType);
      if (contentType && mediaType && !isXmlMediaType(mediaType)) {
        record(invocation, diagnostics.nonXmlContentType(contentType));
      }

      return { bytes: outcome.raw.bytes, charset: outcome.raw.declaredCharsetFromTransport };
    }
  }
}

/**
 * Decodes the document. Returns undefined when no codec can read it.
 */
function decodePhase(
  invocation: Invocation,
  bytes: Buffer,
  charset: string | undefined
): string | undefined {
  enter(invocation, "decoding");
  const resolved = resolveEncoding(bytes, charset);
  invocation.result.encoding = resolved.encoding;

  if (resolved.kind === "codec_unavailable") {
    record(invocation, resolved.diagnostic);
    return undefined;
  }

  if (resolved.transcodingDiagnostic) {
    record(invocation, resolved.transcodingDiagnostic);
  }
  return resolved.text;
}

function parsePhase(invocation: Invocation, text: string): MappedFeed {
  const options: StructuralParseOptions = {
    baseUrl: invocation.result.href,
    resolveRelativeUris: invocation.config.resolveRelativeUris,
    normalizeDate: invocation.normalizeDate,
  };

  if (invocation.config.strictParsing) {
    enter(invocation, "parsing_strict");
    const strict = parseStrict(text, options);
    if (strict.ok) {
      return strict.feed;
    }
    record(invocation, strict.error);
  }

  enter(invocation, "parsing_fallback");
  return parseLenient(text, options);
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Parses a feed from a URL, a local file, or a document.
 *
 * @param source - http(s) URL, file: URL, local path, or document content
 * @param options - Cache validators, extra headers, and configuration
 *   overrides for this call
 * @returns The parse result; `bozo` is set if any tolerant path was taken
 * @throws FeedSourceError if a local source cannot be read
 *
 * @example
 * const result = await parse("https://example.com/feed.xml");
 * for (const entry of result.entries) {
 *   console.log(entry.title, entry.publishedParsed);
 * }
 *
 * @example
 * // Conditional fetch with validators from the previous result
 * const next = await parse(result.href ?? url, { etag: result.etag, modified: result.modified });
 * if (next.status === 304) {
 *   // unchanged
 * }
 */
export async function parse(source: FeedSource, options: ParseOptions = {}): Promise<ParseResult> {
  const config = resolveEngineConfig(options.config);
  const classified = classifySource(source);

  const invocation: Invocation = {
    config,
    log: createParseLogger({ source: describeSource(classified) }),
    normalizeDate: options.normalizeDate ?? defaultNormalizeDate,
    phase: "fetching",
    result: {
      version: "",
      headers: new HeaderMap(),
      feed: {},
      entries: [],
      bozo: false,
      diagnostics: [],
    },
  };
  enter(invocation, "fetching");

  let text: string | undefined;
  switch (classified.kind) {
    case "url": {
      const fetched = await fetchPhase(invocation, classified.url, options);
      if (!fetched) {
        return finish(invocation);
      }
      text = decodePhase(invocation, fetched.bytes, fetched.charset);
      break;
    }
    case "file":
      text = decodePhase(invocation, await readLocalSource(classified.path), undefined);
      break;
    case "bytes":
      text = decodePhase(invocation, classified.bytes, undefined);
      break;
    case "text":
      // Already decoded by the caller
      enter(invocation, "decoding");
      invocation.result.encoding = "utf-8";
      text = classified.text;
      break;
  }

  if (text === undefined) {
    return finish(invocation);
  }

  const mapped = parsePhase(invocation, text);
  invocation.result.version = mapped.version;
  invocation.result.feed = mapped.feed;
  invocation.result.entries = mapped.entries;
  if (mapped.version === "") {
    record(invocation, diagnostics.unknownFormat());
  }

  return finish(invocation);
}
