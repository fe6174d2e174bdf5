/**
 * HTTP feed fetching.
 * Handles conditional GET requests, redirects, decompression, and error
 * handling. Nothing here throws: every failure is an outcome.
 */

import { STATUS_CODES } from "node:http";
import type { Dispatcher } from "undici";
import { buildConditionalHeaders, type ModifiedValidator } from "./cache-headers";
import { diagnostics, type BozoDiagnostic } from "../diagnostics";
import { charsetFromContentType } from "../encoding/charset";
import { decompressBody } from "../http/compression";
import {
  ACCEPT_ENCODING,
  ContentTooLargeError,
  FEED_ACCEPT_HEADER,
  RequestTimeoutError,
  formatNetworkErrorMessage,
  httpGet,
  type HttpGetResult,
} from "../http/fetch";
import { HeaderMap, type HeaderInit } from "../http/headers";
import { USER_AGENT } from "../http/user-agent";
import {
  DEFAULT_FETCH_TIMEOUT_MS,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_MAX_SIZE_BYTES,
} from "../config/env";

/**
 * Options for fetching a feed.
 */
export interface FetchFeedOptions {
  /** ETag from previous response for conditional GET */
  etag?: string;
  /** Last-Modified value from previous response for conditional GET */
  modified?: ModifiedValidator;
  /** Headers merged over the defaults, case-insensitively */
  extraHeaders?: HeaderInit;
  /** User-Agent header to send (overrides default) */
  userAgent?: string;
  /** Timeout for each request in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Maximum number of redirects to follow (default: 5) */
  maxRedirects?: number;
  /** Maximum response body size in bytes (default: 10MB) */
  maxSizeBytes?: number;
  /** undici dispatcher; defaults to the global one */
  dispatcher?: Dispatcher;
}

/**
 * A redirect that was followed.
 */
export interface RedirectInfo {
  /** The URL we were redirected to */
  url: string;
  /** Status of the redirecting response */
  status: number;
  /** Type of redirect */
  type: "permanent" | "temporary";
}

/**
 * A response body and what the transport said about it. The bytes are
 * already decompressed.
 */
export interface RawDocument {
  readonly bytes: Buffer;
  readonly declaredCharsetFromTransport?: string;
  readonly contentEncoding?: string;
  readonly contentType?: string;
}

/**
 * A response with a body to parse. Covers every status that is not a
 * redirect or 304, including 4xx and 5xx.
 */
interface FetchFreshResult {
  kind: "fresh";
  raw: RawDocument;
  /** Status of the first response in the chain */
  status: number;
  headers: HeaderMap;
  /** Final URL after redirects */
  finalUrl: string;
  redirects: RedirectInfo[];
  /** Compression and status anomalies */
  diagnostics: BozoDiagnostic[];
}

/**
 * Result of a 304 Not Modified response.
 */
interface FetchNotModifiedResult {
  kind: "not_modified";
  status: 304;
  headers: HeaderMap;
  finalUrl: string;
  redirects: RedirectInfo[];
}

/**
 * The redirect limit was reached before a non-redirect response.
 */
interface FetchRedirectedResult {
  kind: "redirected";
  /** The last Location received */
  finalUrl: string;
  /** Status of the first response in the chain */
  status: number;
  redirects: RedirectInfo[];
  diagnostic: BozoDiagnostic;
}

/**
 * Result of a network, timeout, or size-limit error.
 */
interface FetchTransportErrorResult {
  kind: "transport_error";
  cause: {
    message: string;
    /** Whether this was a timeout */
    timeout: boolean;
  };
  /** The URL being requested when the error occurred */
  finalUrl: string;
  redirects: RedirectInfo[];
  diagnostic: BozoDiagnostic;
}

/**
 * All possible fetch outcomes.
 */
export type FetchOutcome =
  | FetchFreshResult
  | FetchNotModifiedResult
  | FetchRedirectedResult
  | FetchTransportErrorResult;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Determines redirect type from status code.
 */
function getRedirectType(statusCode: number): "permanent" | "temporary" {
  // 301 Moved Permanently, 308 Permanent Redirect
  if (statusCode === 301 || statusCode === 308) {
    return "permanent";
  }
  // 302 Found, 303 See Other, 307 Temporary Redirect
  return "temporary";
}

/**
 * Where a redirect response points, resolved against the request URL.
 * Undefined for non-redirect statuses and for a missing or unparseable
 * Location.
 */
function redirectTarget(status: number, headers: HeaderMap, currentUrl: string): string | undefined {
  const location = headers.get("location");
  if (!REDIRECT_STATUSES.has(status) || !location || !URL.canParse(location, currentUrl)) {
    return undefined;
  }
  return new URL(location, currentUrl).toString();
}

/**
 * Whether a status code is registered with IANA (as known to Node).
 */
export function isKnownStatus(status: number): boolean {
  return STATUS_CODES[status] !== undefined;
}

/**
 * Builds the request headers: defaults, then validators, then the caller's
 * extra headers, which win on any name collision.
 */
export function buildRequestHeaders(options: FetchFeedOptions): HeaderMap {
  const headers = new HeaderMap({
    "User-Agent": options.userAgent || USER_AGENT,
    Accept: FEED_ACCEPT_HEADER,
    "Accept-Encoding": ACCEPT_ENCODING,
    "A-IM": "feed",
  });

  headers.merge(buildConditionalHeaders({ etag: options.etag, modified: options.modified }));

  if (options.extraHeaders) {
    headers.merge(options.extraHeaders);
  }

  return headers;
}

/**
 * Fetches a feed from the given URL.
 *
 * Supports:
 * - Conditional GET with If-None-Match (ETag) and If-Modified-Since
 * - Redirects (301/302/303/307/308) up to a hop limit
 * - gzip and deflate bodies, including mislabeled and truncated ones
 * - Timeouts and a body size limit
 *
 * @param url - The feed URL to fetch
 * @param options - Fetch options
 * @returns The fetch outcome
 *
 * @example
 * // Initial fetch
 * const outcome = await fetchFeed("https://example.com/feed.xml");
 *
 * // Conditional fetch
 * const outcome = await fetchFeed("https://example.com/feed.xml", {
 *   etag: '"abc123"',
 *   modified: "Wed, 21 Oct 2015 07:28:00 GMT",
 * });
 */
export async function fetchFeed(url: string, options: FetchFeedOptions = {}): Promise<FetchOutcome> {
  const {
    timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
    maxRedirects = DEFAULT_MAX_REDIRECTS,
    maxSizeBytes = DEFAULT_MAX_SIZE_BYTES,
    dispatcher,
  } = options;

  const headers = buildRequestHeaders(options);
  const redirects: RedirectInfo[] = [];
  let currentUrl = url;

  for (let redirectCount = 0; ; redirectCount++) {
    let response: HttpGetResult;
    try {
      response = await httpGet(currentUrl, {
        headers,
        timeoutMs,
        maxSizeBytes,
        readBody: (status, responseHeaders) =>
          status !== 304 && redirectTarget(status, responseHeaders, currentUrl) === undefined,
        dispatcher,
      });
    } catch (error) {
      return transportError(error, currentUrl, redirects);
    }

    const firstStatus = redirects[0]?.status ?? response.status;

    // Handle redirects
    const redirectUrl = redirectTarget(response.status, response.headers, currentUrl);
    if (redirectUrl) {
      redirects.push({
        url: redirectUrl,
        status: response.status,
        type: getRedirectType(response.status),
      });

      if (redirectCount === maxRedirects) {
        return {
          kind: "redirected",
          finalUrl: redirectUrl,
          status: redirects[0].status,
          redirects,
          diagnostic: diagnostics.tooManyRedirects(redirectUrl, maxRedirects),
        };
      }

      currentUrl = redirectUrl;
      continue;
    }

    // Handle 304 Not Modified
    if (response.status === 304) {
      return {
        kind: "not_modified",
        status: 304,
        headers: response.headers,
        finalUrl: currentUrl,
        redirects,
      };
    }

    // Everything else has a body worth parsing, whatever its status
    const found: BozoDiagnostic[] = [];
    if (!isKnownStatus(response.status)) {
      found.push(diagnostics.unknownStatus(response.status));
    }

    const contentEncoding = response.headers.get("content-encoding");
    const decompressed = decompressBody(response.body, contentEncoding);
    if (decompressed.diagnostic) {
      found.push(decompressed.diagnostic);
    }

    const contentType = response.headers.get("content-type");
    return {
      kind: "fresh",
      raw: {
        bytes: decompressed.bytes,
        declaredCharsetFromTransport: charsetFromContentType(contentType),
        contentEncoding,
        contentType,
      },
      status: firstStatus,
      headers: response.headers,
      finalUrl: currentUrl,
      redirects,
      diagnostics: found,
    };
  }
}

function transportError(
  error: unknown,
  url: string,
  redirects: RedirectInfo[]
): FetchTransportErrorResult {
  if (error instanceof RequestTimeoutError) {
    return {
      kind: "transport_error",
      cause: { message: error.message, timeout: true },
      finalUrl: url,
      redirects,
      diagnostic: diagnostics.timeout(url, error.timeoutMs),
    };
  }

  if (error instanceof ContentTooLargeError) {
    return {
      kind: "transport_error",
      cause: { message: error.message, timeout: false },
      finalUrl: url,
      redirects,
      diagnostic: diagnostics.contentTooLarge(error.maxBytes, error.receivedBytes),
    };
  }

  const message =
    error instanceof Error ? formatNetworkErrorMessage(error) : "Unknown network error";
  return {
    kind: "transport_error",
    cause: { message, timeout: false },
    finalUrl: url,
    redirects,
    diagnostic: diagnostics.networkError(url, message),
  };
}
