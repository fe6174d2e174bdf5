/**
 * Maps an element tree to feed metadata and entries.
 *
 * Handles RSS 0.9x, RSS 1.0 (RDF), RSS 2.0, and Atom 0.1-1.0. Element names
 * arrive lowercased, so "pubDate" is matched as "pubdate".
 */

import type { DateNormalizer } from "../dates/normalizer";
import type { CanonicalTimestamp } from "../dates/timestamp";
import { looksLikeHtml } from "./html-detect";
import type { FeedEntry, FeedMetadata, FeedVersion, MappedFeed } from "./types";
import {
  childElements,
  findChild,
  innerXml,
  textContent,
  type XmlElement,
} from "./xml-tree";

export interface MapperOptions {
  /** URL relative links are resolved against */
  baseUrl?: string;
  resolveRelativeUris: boolean;
  normalizeDate: DateNormalizer;
}

const ATOM_10_NAMESPACE = "http://www.w3.org/2005/Atom";

const RSS_VERSIONS: Record<string, FeedVersion> = {
  "0.91": "rss091u",
  "0.92": "rss092",
  "0.93": "rss093",
  "0.94": "rss094",
};

const ATOM_VERSIONS: Record<string, FeedVersion> = {
  "0.1": "atom01",
  "0.2": "atom02",
  "0.3": "atom03",
};

const ROOT_NAMES = ["rss", "rdf:rdf", "feed"];

// ============================================================================
// Helpers
// ============================================================================

function text(element: XmlElement | undefined): string | undefined {
  if (!element) {
    return undefined;
  }
  return textContent(element).trim() || undefined;
}

function resolveUrl(href: string | undefined, options: MapperOptions): string | undefined {
  if (!href || !options.resolveRelativeUris || !options.baseUrl) {
    return href;
  }
  if (!URL.canParse(href, options.baseUrl)) {
    return href;
  }
  return new URL(href, options.baseUrl).toString();
}

function dateField(
  element: XmlElement | undefined,
  options: MapperOptions
): { raw?: string; parsed?: CanonicalTimestamp } {
  const raw = text(element);
  return raw ? { raw, parsed: options.normalizeDate(raw) } : {};
}

/**
 * Finds the feed's root element among the document's top-level nodes.
 */
export function findRoot(document: XmlElement): XmlElement | undefined {
  return childElements(document).find((element) => ROOT_NAMES.includes(element.name));
}

/**
 * Determines the feed version from the root element.
 */
export function detectVersion(root: XmlElement | undefined): FeedVersion {
  if (!root) {
    return "";
  }

  if (root.name === "rss") {
    const version = root.attributes.version?.trim() ?? "";
    if (version.startsWith("2")) {
      return "rss20";
    }
    return RSS_VERSIONS[version] ?? "rss";
  }

  if (root.name === "rdf:rdf") {
    const namespace = root.attributes.xmlns ?? "";
    if (namespace.includes("purl.org/rss/1.0")) {
      return "rss10";
    }
    if (namespace.includes("my.netscape.com/rdf/simple/0.9")) {
      return "rss090";
    }
    return "rss";
  }

  if (root.name === "feed") {
    if (root.attributes.xmlns === ATOM_10_NAMESPACE) {
      return "atom10";
    }
    return ATOM_VERSIONS[root.attributes.version?.trim() ?? ""] ?? "atom";
  }

  return "";
}

// ============================================================================
// RSS
// ============================================================================

function mapRssItem(item: XmlElement, options: MapperOptions): FeedEntry {
  const guid = findChild(item, "guid");
  const id = text(guid);

  let link = resolveUrl(text(findChild(item, "link")), options);
  // A permalink guid doubles as the link
  const isPermaLink = guid?.attributes.ispermalink?.toLowerCase() !== "false";
  if (!link && id && isPermaLink && /^https?:\/\//i.test(id)) {
    link = id;
  }

  const entry: FeedEntry = {
    id,
    title: text(findChild(item, "title", "dc:title")),
    link,
    author: text(findChild(item, "author", "dc:creator")),
  };

  const description = text(findChild(item, "description", "dc:description"));
  if (description) {
    entry.summary = description;
    entry.summaryType = looksLikeHtml(description) ? "text/html" : "text/plain";
  }

  const encoded = text(findChild(item, "content:encoded"));
  if (encoded) {
    entry.content = encoded;
    entry.contentType = "text/html";
  }

  const published = dateField(findChild(item, "pubdate", "dc:date"), options);
  entry.published = published.raw;
  entry.publishedParsed = published.parsed;

  const updated = dateField(findChild(item, "atom:updated", "dcterms:modified"), options);
  entry.updated = updated.raw;
  entry.updatedParsed = updated.parsed;

  return entry;
}

function mapRssChannel(channel: XmlElement, options: MapperOptions): FeedMetadata {
  const link = childElements(channel, "link")
    .map((element) => text(element))
    .find(Boolean);
  const updated = dateField(findChild(channel, "lastbuilddate", "pubdate", "dc:date"), options);

  return {
    title: text(findChild(channel, "title", "dc:title")),
    link: resolveUrl(link, options),
    subtitle: text(findChild(channel, "description", "dc:description")),
    language: text(findChild(channel, "language", "dc:language")),
    generator: text(findChild(channel, "generator")),
    author: text(findChild(channel, "managingeditor", "dc:creator")),
    updated: updated.raw,
    updatedParsed: updated.parsed,
  };
}

function mapRss(root: XmlElement, options: MapperOptions): Omit<MappedFeed, "version"> {
  const channel = findChild(root, "channel");
  const feed = channel ? mapRssChannel(channel, options) : {};

  // RSS 2.0 nests items in the channel; RSS 1.0 and 0.90 make them its siblings
  const items = [
    ...(channel ? childElements(channel, "item") : []),
    ...childElements(root, "item"),
  ];

  return { feed, entries: items.map((item) => mapRssItem(item, options)) };
}

// ============================================================================
// Atom
// ============================================================================

interface AtomText {
  value: string;
  type: string;
}

/**
 * Reads an Atom text construct, honoring its type attribute.
 */
function atomText(element: XmlElement | undefined): AtomText | undefined {
  if (!element) {
    return undefined;
  }

  const type = element.attributes.type?.trim().toLowerCase() ?? "text";

  if (type === "xhtml" || type === "application/xhtml+xml") {
    const wrapper = childElements(element);
    const source = wrapper.length === 1 && wrapper[0].name === "div" ? wrapper[0] : element;
    const value = innerXml(source).trim();
    return value ? { value, type: "application/xhtml+xml" } : undefined;
  }

  const value = text(element);
  if (!value) {
    return undefined;
  }
  if (type === "html") {
    return { value, type: "text/html" };
  }
  if (type === "text") {
    return { value, type: "text/plain" };
  }
  return { value, type };
}

function atomLink(element: XmlElement): string | undefined {
  const alternate = childElements(element, "link").find(
    (link) => (link.attributes.rel ?? "alternate") === "alternate" && link.attributes.href
  );
  return alternate?.attributes.href;
}

function personName(element: XmlElement | undefined): string | undefined {
  if (!element) {
    return undefined;
  }
  return text(findChild(element, "name")) ?? text(element);
}

function mapAtomEntry(element: XmlElement, options: MapperOptions): FeedEntry {
  const entry: FeedEntry = {
    id: text(findChild(element, "id")),
    title: atomText(findChild(element, "title"))?.value,
    link: resolveUrl(atomLink(element), options),
    author: personName(findChild(element, "author")),
  };

  const summary = atomText(findChild(element, "summary"));
  if (summary) {
    entry.summary = summary.value;
    entry.summaryType = summary.type;
  }

  const content = atomText(findChild(element, "content"));
  if (content) {
    entry.content = content.value;
    entry.contentType = content.type;
  }

  // Atom 0.3 calls these issued and modified
  const published = dateField(findChild(element, "published", "issued"), options);
  entry.published = published.raw;
  entry.publishedParsed = published.parsed;

  const updated = dateField(findChild(element, "updated", "modified"), options);
  entry.updated = updated.raw;
  entry.updatedParsed = updated.parsed;

  return entry;
}

function mapAtom(root: XmlElement, options: MapperOptions): Omit<MappedFeed, "version"> {
  const updated = dateField(findChild(root, "updated", "modified"), options);

  const feed: FeedMetadata = {
    title: atomText(findChild(root, "title"))?.value,
    link: resolveUrl(atomLink(root), options),
    subtitle: atomText(findChild(root, "subtitle", "tagline"))?.value,
    id: text(findChild(root, "id")),
    language: root.attributes["xml:lang"],
    generator: text(findChild(root, "generator")),
    author: personName(findChild(root, "author")),
    updated: updated.raw,
    updatedParsed: updated.parsed,
  };

  const entries = childElements(root, "entry").map((entry) => mapAtomEntry(entry, options));
  return { feed, entries };
}

// ============================================================================
// Entry point
// ============================================================================

/**
 * Maps a parsed document to feed metadata and entries. A document with no
 * feed root maps to an empty feed with version "".
 */
export function mapFeed(document: XmlElement, options: MapperOptions): MappedFeed {
  const root = findRoot(document);
  const version = detectVersion(root);

  if (!root || version === "") {
    return { version: "", feed: {}, entries: [] };
  }

  const mapped = root.name === "feed" ? mapAtom(root, options) : mapRss(root, options);
  return { version, ...mapped };
}
