/**
 * Encoding resolution: raw bytes plus an optional transport charset to
 * Unicode text.
 *
 * Detection order:
 * 1. Byte signatures (EBCDIC, UTF-32, UTF-16, UTF-8 BOM). A signature always
 *    wins over a declared charset; a disagreement becomes a diagnostic.
 * 2. For ASCII-compatible bytes, candidates in order: the transport charset,
 *    the XML declaration's encoding, utf-8, windows-1252. The first one that
 *    decodes cleanly is used.
 *
 * The only way resolution fails is a declared charset this runtime has no
 * codec for, over bytes that are not valid UTF-8 either.
 */

import * as iconv from "iconv-lite";
import { diagnostics, type BozoDiagnostic } from "../diagnostics";
import { isCharsetSupported, isSameCharsetFamily, normalizeCharset } from "./charset";
import { decodeEbcdic } from "./ebcdic";
import {
  readXmlDeclarationEncoding,
  readXmlDeclarationEncodingFromBytes,
  sniffEncoding,
  type SniffedEncoding,
} from "./sniff";

// ============================================================================
// Types
// ============================================================================

/**
 * Successfully decoded text.
 */
export interface ResolvedText {
  kind: "decoded";
  text: string;
  /** The encoding the text was actually decoded with */
  encoding: string;
  /** Set when the declared charset was overridden or a fallback was used */
  transcodingDiagnostic?: BozoDiagnostic;
}

/**
 * The document declares a charset this runtime cannot decode.
 */
export interface CodecUnavailable {
  kind: "codec_unavailable";
  encoding: string;
  diagnostic: BozoDiagnostic;
}

export type EncodingResolution = ResolvedText | CodecUnavailable;

const FINAL_FALLBACK = "windows-1252";

// ============================================================================
// Decoding
// ============================================================================

function decodeUtf8Strict(bytes: Uint8Array): string | undefined {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Decodes with the given charset. Unless `lenient` is set, output containing
 * replacement characters counts as a failure.
 */
function tryDecode(bytes: Uint8Array, charset: string, lenient: boolean): string | undefined {
  if (charset === "utf-8") {
    return decodeUtf8Strict(bytes);
  }
  if (charset === "us-ascii") {
    return bytes.every((byte) => byte < 0x80) ? Buffer.from(bytes).toString("latin1") : undefined;
  }
  const text = iconv.decode(Buffer.from(bytes), charset);
  if (!lenient && text.includes("\uFFFD")) {
    return undefined;
  }
  return text;
}

function decodeSniffed(bytes: Uint8Array, sniffed: SniffedEncoding): string {
  const body = bytes.subarray(sniffed.bomLength);
  if (sniffed.encoding === "cp037") {
    return decodeEbcdic(body);
  }
  return iconv.decode(Buffer.from(body), sniffed.encoding, { stripBOM: true });
}

// ============================================================================
// Resolution
// ============================================================================

function resolveSniffed(
  bytes: Uint8Array,
  sniffed: SniffedEncoding,
  transportCharset: string | undefined
): ResolvedText {
  const text = decodeSniffed(bytes, sniffed);
  const declared = transportCharset ?? readXmlDeclarationEncoding(text);

  const result: ResolvedText = { kind: "decoded", text, encoding: sniffed.encoding };
  if (declared && !isSameCharsetFamily(declared, sniffed.encoding)) {
    result.transcodingDiagnostic = diagnostics.encodingOverride(
      normalizeCharset(declared),
      sniffed.encoding
    );
  }
  return result;
}

function resolveAsciiCompatible(
  bytes: Uint8Array,
  transportCharset: string | undefined
): EncodingResolution {
  const xmlCharset = readXmlDeclarationEncodingFromBytes(bytes);
  const declared = transportCharset
    ? normalizeCharset(transportCharset)
    : xmlCharset
      ? normalizeCharset(xmlCharset)
      : undefined;

  const candidates: string[] = [];
  for (const label of [transportCharset, xmlCharset, "utf-8", FINAL_FALLBACK]) {
    if (!label) {
      continue;
    }
    const charset = normalizeCharset(label);
    if (!candidates.includes(charset)) {
      candidates.push(charset);
    }
  }

  let unavailable: string | undefined;
  for (const charset of candidates) {
    if (!isCharsetSupported(charset)) {
      unavailable ??= charset;
      continue;
    }

    const text = tryDecode(bytes, charset, charset === FINAL_FALLBACK);
    if (text === undefined) {
      if (charset === "utf-8" && unavailable) {
        return {
          kind: "codec_unavailable",
          encoding: unavailable,
          diagnostic: diagnostics.codecUnavailable(unavailable),
        };
      }
      continue;
    }

    const result: ResolvedText = { kind: "decoded", text, encoding: charset };
    if (declared && !isSameCharsetFamily(declared, charset)) {
      result.transcodingDiagnostic = diagnostics.encodingOverride(declared, charset);
    } else if (!declared && charset !== "utf-8") {
      result.transcodingDiagnostic = diagnostics.encodingFallback(charset);
    }
    return result;
  }

  // windows-1252 always decodes, so this is only reached if iconv-lite lacks it
  const encoding = unavailable ?? FINAL_FALLBACK;
  return { kind: "codec_unavailable", encoding, diagnostic: diagnostics.codecUnavailable(encoding) };
}

/**
 * Resolves raw document bytes to text.
 *
 * @param bytes - The document body, already decompressed
 * @param transportCharset - The charset parameter from the HTTP Content-Type
 *
 * @example
 * const resolved = resolveEncoding(bytes, "iso-8859-1");
 * if (resolved.kind === "decoded") {
 *   parse(resolved.text);
 * }
 */
export function resolveEncoding(bytes: Uint8Array, transportCharset?: string): EncodingResolution {
  const sniffed = sniffEncoding(bytes);
  if (sniffed) {
    return resolveSniffed(bytes, sniffed, transportCharset);
  }
  return resolveAsciiCompatible(bytes, transportCharset);
}
