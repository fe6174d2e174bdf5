/**
 * Bozo diagnostics.
 *
 * A diagnostic records that tolerant handling was needed somewhere in a parse
 * call. Diagnostics are returned as values on the ParseResult; none of them
 * is ever thrown.
 */

/**
 * Diagnostic codes, grouped by the stage that produces them.
 */
export const BozoCodes = {
  // Transport
  NETWORK_ERROR: "network_error",
  TIMEOUT: "timeout",
  TOO_MANY_REDIRECTS: "too_many_redirects",
  CONTENT_TOO_LARGE: "content_too_large",
  UNKNOWN_STATUS: "unknown_status",
  NON_XML_CONTENT_TYPE: "non_xml_content_type",

  // Compression
  COMPRESSION_MISMATCH: "compression_mismatch",
  COMPRESSION_TRUNCATED: "compression_truncated",

  // Encoding
  ENCODING_OVERRIDE: "encoding_override",
  ENCODING_FALLBACK: "encoding_fallback",
  CODEC_UNAVAILABLE: "codec_unavailable",

  // Structure
  NOT_WELL_FORMED: "xml_not_well_formed",
  UNKNOWN_FORMAT: "unknown_format",
} as const;

export type BozoCode = (typeof BozoCodes)[keyof typeof BozoCodes];

/**
 * The stage a diagnostic came from.
 */
export type BozoStage = "transport" | "compression" | "encoding" | "structure";

const stageByCode: Record<BozoCode, BozoStage> = {
  network_error: "transport",
  timeout: "transport",
  too_many_redirects: "transport",
  content_too_large: "transport",
  unknown_status: "transport",
  non_xml_content_type: "transport",
  compression_mismatch: "compression",
  compression_truncated: "compression",
  encoding_override: "encoding",
  encoding_fallback: "encoding",
  codec_unavailable: "encoding",
  xml_not_well_formed: "structure",
  unknown_format: "structure",
};

export interface BozoDiagnostic {
  code: BozoCode;
  stage: BozoStage;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Creates a diagnostic with its stage filled in.
 */
export function createDiagnostic(
  code: BozoCode,
  message: string,
  details?: Record<string, unknown>
): BozoDiagnostic {
  return details
    ? { code, stage: stageByCode[code], message, details }
    : { code, stage: stageByCode[code], message };
}

/**
 * Convenience constructors for every diagnostic the library emits.
 */
export const diagnostics = {
  networkError: (url: string, message: string) =>
    createDiagnostic(BozoCodes.NETWORK_ERROR, message, { url }),

  timeout: (url: string, timeoutMs: number) =>
    createDiagnostic(BozoCodes.TIMEOUT, `Request timed out after ${timeoutMs}ms`, { url }),

  tooManyRedirects: (lastUrl: string, hops: number) =>
    createDiagnostic(BozoCodes.TOO_MANY_REDIRECTS, `Gave up after ${hops} redirects`, {
      lastUrl,
    }),

  contentTooLarge: (maxBytes: number, receivedBytes: number) =>
    createDiagnostic(
      BozoCodes.CONTENT_TOO_LARGE,
      `Response body exceeds maximum size of ${maxBytes} bytes`,
      { maxBytes, receivedBytes }
    ),

  unknownStatus: (status: number) =>
    createDiagnostic(BozoCodes.UNKNOWN_STATUS, `Unrecognized HTTP status ${status}`, { status }),

  nonXmlContentType: (contentType: string) =>
    createDiagnostic(
      BozoCodes.NON_XML_CONTENT_TYPE,
      `${contentType} is not an XML media type`,
      { contentType }
    ),

  compressionMismatch: (contentEncoding: string, cause: string) =>
    createDiagnostic(
      BozoCodes.COMPRESSION_MISMATCH,
      `Body is not valid ${contentEncoding} data: ${cause}`,
      { contentEncoding }
    ),

  compressionTruncated: (contentEncoding: string, recoveredBytes: number) =>
    createDiagnostic(
      BozoCodes.COMPRESSION_TRUNCATED,
      `Compressed ${contentEncoding} body ended unexpectedly`,
      { contentEncoding, recoveredBytes }
    ),

  encodingOverride: (declared: string, actual: string) =>
    createDiagnostic(
      BozoCodes.ENCODING_OVERRIDE,
      `Document declared as ${declared}, but parsed as ${actual}`,
      { declared, actual }
    ),

  encodingFallback: (actual: string) =>
    createDiagnostic(
      BozoCodes.ENCODING_FALLBACK,
      `Document is not valid utf-8; decoded as ${actual}`,
      { actual }
    ),

  codecUnavailable: (encoding: string) =>
    createDiagnostic(
      BozoCodes.CODEC_UNAVAILABLE,
      `Document declared as ${encoding}, which this runtime cannot decode`,
      { encoding }
    ),

  notWellFormed: (message: string, line?: number, column?: number) =>
    createDiagnostic(BozoCodes.NOT_WELL_FORMED, message, { line, column }),

  unknownFormat: () =>
    createDiagnostic(
      BozoCodes.UNKNOWN_FORMAT,
      "Unknown feed format: no RSS, RDF, or Atom root element"
    ),
};
