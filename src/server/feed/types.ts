/**
 * Feed parsing output interfaces.
 * These are the common output format for both the strict and the relaxed
 * parser, and for the engine's ParseResult.
 */

import type { CanonicalTimestamp } from "../dates/timestamp";
import type { BozoDiagnostic } from "../diagnostics";
import type { HeaderMap } from "../http/headers";

/**
 * Detected feed format and version. Empty when the document is not a
 * recognizable feed.
 */
export type FeedVersion =
  | "rss090"
  | "rss091u"
  | "rss092"
  | "rss093"
  | "rss094"
  | "rss20"
  | "rss"
  | "rss10"
  | "atom01"
  | "atom02"
  | "atom03"
  | "atom10"
  | "atom"
  | "";

/**
 * A parsed entry from any feed format.
 */
export interface FeedEntry {
  /** Unique identifier for the entry (guid in RSS, id in Atom) */
  id?: string;
  /** Entry title */
  title?: string;
  /** URL link to the entry */
  link?: string;
  /** Summary/description of the entry */
  summary?: string;
  /** Media type of the summary: text/plain, text/html, or application/xhtml+xml */
  summaryType?: string;
  /** Full content of the entry (content:encoded in RSS, content in Atom) */
  content?: string;
  contentType?: string;
  /** Author name */
  author?: string;
  /** Publication date as it appeared in the feed */
  published?: string;
  publishedParsed?: CanonicalTimestamp;
  /** Last update date as it appeared in the feed */
  updated?: string;
  updatedParsed?: CanonicalTimestamp;
}

/**
 * Feed-level metadata.
 */
export interface FeedMetadata {
  /** Feed title */
  title?: string;
  /** URL to the feed's website */
  link?: string;
  /** Feed description (RSS description, Atom subtitle or tagline) */
  subtitle?: string;
  /** Feed identifier (Atom id) */
  id?: string;
  language?: string;
  generator?: string;
  author?: string;
  updated?: string;
  updatedParsed?: CanonicalTimestamp;
}

/**
 * What the structural parser extracted from a document.
 */
export interface MappedFeed {
  version: FeedVersion;
  feed: FeedMetadata;
  entries: FeedEntry[];
}

/**
 * The result of one parse call.
 *
 * `bozo` is true exactly when some tolerant path was taken; `diagnostics`
 * lists every anomaly in the order it was found and `bozoException` is the
 * first of them.
 */
export interface ParseResult {
  version: FeedVersion;
  /** HTTP status of the first response, absent for local sources */
  status?: number;
  /** Final URL after redirects, absent for local sources */
  href?: string;
  /** Response headers, empty for local sources */
  headers: HeaderMap;
  feed: FeedMetadata;
  entries: FeedEntry[];
  /** Encoding the document was decoded with */
  encoding?: string;
  etag?: string;
  /** Last-Modified header value */
  modified?: string;
  /** Last-Modified header, normalized */
  updated?: CanonicalTimestamp;
  contentType?: string;
  bozo: boolean;
  bozoException?: BozoDiagnostic;
  diagnostics: BozoDiagnostic[];
}
