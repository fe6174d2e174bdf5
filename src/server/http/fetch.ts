/**
 * HTTP Fetch Utilities
 *
 * Single-hop GET requests over undici with a timeout, a streaming body size
 * limit, and readable network error messages. Redirects and decompression
 * are left to the caller.
 */

import { request, type Dispatcher } from "undici";
import { HeaderMap } from "./headers";

// ============================================================================
// Custom Errors
// ============================================================================

/**
 * Error thrown when a response body exceeds the maximum allowed size.
 * Checked during streaming to avoid loading the full body into memory.
 */
export class ContentTooLargeError extends Error {
  constructor(
    public readonly url: string,
    public readonly maxBytes: number,
    public readonly receivedBytes: number
  ) {
    super(`Response body exceeds maximum size of ${maxBytes} bytes`);
    this.name = "ContentTooLargeError";
  }
}

/**
 * Error thrown when a request does not complete within its timeout.
 */
export class RequestTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Accept-Encoding header for outgoing requests. Only codings the
 * decompressor understands are advertised.
 */
export const ACCEPT_ENCODING = "gzip, deflate";

/**
 * Accept header for feed requests (RSS, Atom, RDF, XML).
 */
export const FEED_ACCEPT_HEADER =
  "application/atom+xml, application/rdf+xml, application/rss+xml, application/x-netcdf, application/xml;q=0.9, text/xml;q=0.2, */*;q=0.1";

// ============================================================================
// Types
// ============================================================================

export interface HttpGetOptions {
  headers: HeaderMap;
  timeoutMs: number;
  maxSizeBytes: number;
  /** Whether to read the body; followed redirects and 304s skip it */
  readBody: (status: number, headers: HeaderMap) => boolean;
  dispatcher?: Dispatcher;
}

export interface HttpGetResult {
  status: number;
  headers: HeaderMap;
  /** Raw (still compressed) body, empty when not read */
  body: Buffer;
}

// ============================================================================
// Body Reading
// ============================================================================

/**
 * Reads a response body with a streaming size limit.
 * Destroys the stream if the response exceeds maxBytes, preventing OOM.
 *
 * Checks Content-Length first for an early rejection, then enforces the
 * limit while streaming chunks.
 *
 * @throws ContentTooLargeError if the response exceeds the limit
 */
export async function readBodyWithSizeLimit(
  body: Dispatcher.ResponseData["body"],
  contentLength: string | undefined,
  maxBytes: number,
  url: string
): Promise<Buffer> {
  if (contentLength) {
    const declaredSize = parseInt(contentLength, 10);
    if (!isNaN(declaredSize) && declaredSize > maxBytes) {
      body.destroy();
      throw new ContentTooLargeError(url, maxBytes, declaredSize);
    }
  }

  const chunks: Buffer[] = [];
  let receivedBytes = 0;

  for await (const chunk of body) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    receivedBytes += buffer.byteLength;
    if (receivedBytes > maxBytes) {
      body.destroy();
      throw new ContentTooLargeError(url, maxBytes, receivedBytes);
    }
    chunks.push(buffer);
  }

  return Buffer.concat(chunks, receivedBytes);
}

// ============================================================================
// Requests
// ============================================================================

/**
 * Performs one GET request without following redirects or decoding the body.
 *
 * @throws RequestTimeoutError if the request or body read exceeds timeoutMs
 * @throws ContentTooLargeError if the body exceeds maxSizeBytes
 * @throws the underlying network error otherwise
 */
export async function httpGet(url: string, options: HttpGetOptions): Promise<HttpGetResult> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await request(url, {
      method: "GET",
      headers: options.headers.toRecord(),
      signal: controller.signal,
      dispatcher: options.dispatcher,
    });

    const headers = HeaderMap.fromIncoming(response.headers);
    let body: Buffer = Buffer.alloc(0);
    if (options.readBody(response.statusCode, headers)) {
      body = await readBodyWithSizeLimit(
        response.body,
        headers.get("content-length"),
        options.maxSizeBytes,
        url
      );
    } else {
      await response.body.dump();
    }

    return { status: response.statusCode, headers, body };
  } catch (error) {
    if (controller.signal.aborted) {
      throw new RequestTimeoutError(url, options.timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}

// ============================================================================
// Error Messages
// ============================================================================

function errorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Translates technical Node.js network error messages into readable
 * descriptions.
 *
 * @param error - The error object from a failed request
 * @returns A readable error message
 */
export function formatNetworkErrorMessage(error: Error): string {
  const message = error.message;
  const code = errorCode(error);

  // DNS resolution errors
  if (code === "ENOTFOUND" || message.includes("ENOTFOUND")) {
    // Extract domain from messages like "getaddrinfo ENOTFOUND example.com"
    const domainMatch = message.match(/ENOTFOUND\s+(\S+)/);
    const domain = domainMatch?.[1];
    return domain ? `Domain not found: ${domain}` : "Domain not found (DNS lookup failed)";
  }

  // DNS temporary failure (e.g., DNS server not responding)
  if (code === "EAI_AGAIN" || message.includes("EAI_AGAIN")) {
    return "DNS lookup timed out (temporary DNS failure)";
  }

  if (code === "ECONNREFUSED" || message.includes("ECONNREFUSED")) {
    return "Connection refused (server not accepting connections)";
  }

  if (
    code === "ETIMEDOUT" ||
    code === "UND_ERR_CONNECT_TIMEOUT" ||
    message.includes("ETIMEDOUT")
  ) {
    return "Connection timed out";
  }

  if (code === "ECONNRESET" || message.includes("ECONNRESET")) {
    return "Connection reset by server";
  }

  if (code === "EHOSTUNREACH" || message.includes("EHOSTUNREACH")) {
    return "Host unreachable";
  }

  if (code === "ENETUNREACH" || message.includes("ENETUNREACH")) {
    return "Network unreachable";
  }

  // SSL/TLS certificate errors
  if (code === "CERT_HAS_EXPIRED" || message.includes("certificate has expired")) {
    return "SSL certificate has expired";
  }
  if (code === "UNABLE_TO_VERIFY_LEAF_SIGNATURE" || message.includes("unable to verify")) {
    return "SSL certificate verification failed";
  }
  if (
    code === "DEPTH_ZERO_SELF_SIGNED_CERT" ||
    message.includes("self-signed certificate") ||
    message.includes("self signed certificate")
  ) {
    return "SSL certificate is self-signed";
  }
  if (message.includes("certificate") || message.includes("SSL") || message.includes("TLS")) {
    return `SSL/TLS error: ${message}`;
  }

  // undici reports a peer closing mid-response as "other side closed"
  if (
    message.includes("socket hang up") ||
    message.includes("other side closed") ||
    code === "UND_ERR_SOCKET"
  ) {
    return "Connection closed unexpectedly";
  }

  return message;
}
