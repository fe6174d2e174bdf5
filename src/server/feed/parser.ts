/**
 * Structural feed parsing.
 * Provides the strict and the relaxed entry points; both map elements to
 * fields the same way and differ only in how they read the markup.
 */

import { normalizeDate, type DateNormalizer } from "../dates/normalizer";
import { diagnostics, type BozoDiagnostic } from "../diagnostics";
import { mapFeed, type MapperOptions } from "./mapper";
import type { MappedFeed } from "./types";
import { parseLenientTree, parseStrictTree } from "./xml-parsers";

/**
 * Options shared by both parsers.
 */
export interface StructuralParseOptions {
  /** Document URL, for resolving relative links */
  baseUrl?: string;
  /** Resolve relative links against baseUrl (default: true) */
  resolveRelativeUris?: boolean;
  /** Date normalizer for *Parsed fields (default: the built-in recognizers) */
  normalizeDate?: DateNormalizer;
}

export type StrictParseOutcome =
  | { ok: true; feed: MappedFeed }
  | { ok: false; error: BozoDiagnostic };

function mapperOptions(options: StructuralParseOptions): MapperOptions {
  return {
    baseUrl: options.baseUrl,
    resolveRelativeUris: options.resolveRelativeUris ?? true,
    normalizeDate: options.normalizeDate ?? normalizeDate,
  };
}

/**
 * Parses a well-formed document.
 *
 * @returns The mapped feed, or a well-formedness diagnostic when the markup
 *   is broken
 *
 * @example
 * const outcome = parseStrict(text);
 * if (!outcome.ok) {
 *   // fall back to parseLenient(text)
 * }
 */
export function parseStrict(text: string, options: StructuralParseOptions = {}): StrictParseOutcome {
  const tree = parseStrictTree(text);
  if (!tree.ok) {
    return { ok: false, error: diagnostics.notWellFormed(tree.message, tree.line, tree.column) };
  }
  return { ok: true, feed: mapFeed(tree.document, mapperOptions(options)) };
}

/**
 * Parses a document of any quality. Never fails; markup with no feed in it
 * yields version "" and no entries.
 */
export function parseLenient(text: string, options: StructuralParseOptions = {}): MappedFeed {
  return mapFeed(parseLenientTree(text), mapperOptions(options));
}
