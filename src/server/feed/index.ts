/**
 * Feed parsing module.
 * Exports the engine, the transport client, and the structural parsers.
 */

export type {
  FeedVersion,
  FeedEntry,
  FeedMetadata,
  MappedFeed,
  ParseResult,
} from "./types";
export {
  parse,
  classifySource,
  isXmlMediaType,
  type FeedSource,
  type ParseOptions,
  type EnginePhase,
} from "./engine";
export {
  parseStrict,
  parseLenient,
  type StructuralParseOptions,
  type StrictParseOutcome,
} from "./parser";
export {
  fetchFeed,
  type FetchFeedOptions,
  type FetchOutcome,
  type RawDocument,
  type RedirectInfo,
} from "./fetcher";
export {
  buildConditionalHeaders,
  formatHttpDate,
  parseCacheHeaders,
  type ModifiedValidator,
  type ParsedCacheHeaders,
} from "./cache-headers";
export {
  BozoCodes,
  createDiagnostic,
  diagnostics,
  type BozoCode,
  type BozoDiagnostic,
  type BozoStage,
} from "../diagnostics";
export { FeedSourceError } from "./errors";
export { looksLikeHtml } from "./html-detect";
