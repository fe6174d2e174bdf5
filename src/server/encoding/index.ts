export {
  resolveEncoding,
  type EncodingResolution,
  type ResolvedText,
  type CodecUnavailable,
} from "./resolver";
export {
  charsetFromContentType,
  mediaTypeFromContentType,
  normalizeCharset,
  isSameCharsetFamily,
  isCharsetSupported,
} from "./charset";
export { sniffEncoding, readXmlDeclarationEncoding, type SniffedEncoding } from "./sniff";
export { decodeEbcdic } from "./ebcdic";
