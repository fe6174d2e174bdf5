/**
 * Builds the element tree from feed text, in two flavors.
 *
 * - Strict: fast-xml-parser, behind its well-formedness validator plus
 *   checks for what the validator lets through (undeclared entities, a
 *   declaration after leading whitespace, several root elements). Any
 *   violation is reported and no tree is produced.
 * - Relaxed: htmlparser2 in XML mode. Unclosed and mismatched tags are
 *   closed implicitly, unknown entities are left as text. Never fails.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { Parser } from "htmlparser2";
import { decode } from "html-entities";
import { childElements, createElement, textContent, type XmlElement } from "./xml-tree";

/** Name of the synthetic element holding the document's top-level nodes. */
export const DOCUMENT_NODE = "#document";

// ============================================================================
// Strict
// ============================================================================

/**
 * Options for configuring the XML parser.
 * preserveOrder keeps repeated and mixed elements in document order.
 */
const parserOptions = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  preserveOrder: true,
  // Handle CDATA sections
  cdataPropName: "__cdata",
  // Preserve text content
  textNodeName: "#text",
  // Keep every value a string
  parseTagValue: false,
  parseAttributeValue: false,
  // Don't trim whitespace from text nodes
  trimValues: false,
  // Numeric character references are only decoded with this on; undeclared
  // named entities never reach the parser
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
};

export type StrictParseResult =
  | { ok: true; document: XmlElement }
  | { ok: false; message: string; line?: number; column?: number };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [key, attributeValue] of Object.entries(value)) {
    if (typeof attributeValue === "string" || typeof attributeValue === "number") {
      attributes[key.replace(/^@_/, "").toLowerCase()] = String(attributeValue);
    }
  }
  return attributes;
}

/**
 * Converts fast-xml-parser's ordered output
 * (`[{ tag: [...children], ":@": { "@_attr": "v" } }, { "#text": "..." }]`)
 * into tree nodes appended to `parent`.
 */
function appendOrderedNodes(value: unknown, parent: XmlElement): void {
  if (!Array.isArray(value)) {
    return;
  }

  for (const item of value) {
    if (!isRecord(item)) {
      continue;
    }
    for (const [key, content] of Object.entries(item)) {
      if (key === ":@" || key.startsWith("?")) {
        continue;
      }
      if (key === "#text") {
        if (typeof content === "string" || typeof content === "number") {
          parent.children.push(String(content));
        }
        continue;
      }
      if (key === "__cdata") {
        const section = createElement("#cdata");
        appendOrderedNodes(content, section);
        parent.children.push(textContent(section));
        continue;
      }

      const element = createElement(key, readAttributes(item[":@"]));
      appendOrderedNodes(content, element);
      parent.children.push(element);
    }
  }
}

const PREDEFINED_ENTITIES = new Set(["amp", "lt", "gt", "quot", "apos"]);

/** Regions whose "&" is not an entity reference; blanked before scanning. */
const UNSCANNED_REGIONS = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<!DOCTYPE[^[>]*(?:\[[\s\S]*?\])?\s*>/gi;

function position(text: string, index: number): { line: number; column: number } {
  const before = text.slice(0, index).split("\n");
  return { line: before.length, column: before[before.length - 1].length + 1 };
}

/**
 * Finds the first named entity reference that is neither predefined nor
 * declared in the document type.
 */
function findUndeclaredEntity(
  text: string
): { name: string; line: number; column: number } | undefined {
  const declared = new Set(
    Array.from(text.matchAll(/<!ENTITY\s+(?:%\s+)?([^\s"'>]+)/g), (match) => match[1])
  );
  // Same length as the input, so indexes still point into it
  const scanned = text.replace(UNSCANNED_REGIONS, (region) => region.replace(/[^\n]/g, " "));

  for (const match of scanned.matchAll(/&([A-Za-z_:][\w.:-]*);/g)) {
    const name = match[1];
    if (!PREDEFINED_ENTITIES.has(name) && !declared.has(name)) {
      return { name, ...position(text, match.index ?? 0) };
    }
  }
  return undefined;
}

/**
 * Parses well-formed XML. Returns the first well-formedness error otherwise.
 */
export function parseStrictTree(text: string): StrictParseResult {
  if (/^\s+<\?xml[\s?]/.test(text)) {
    const declaration = position(text, text.indexOf("<?xml"));
    return {
      ok: false,
      message: "XML declaration allowed only at the start of the document",
      ...declaration,
    };
  }

  const validation = XMLValidator.validate(text);
  if (validation !== true) {
    return {
      ok: false,
      message: validation.err.msg,
      line: validation.err.line,
      column: validation.err.col,
    };
  }

  const undeclared = findUndeclaredEntity(text);
  if (undeclared) {
    return {
      ok: false,
      message: `Undeclared entity '${undeclared.name}'`,
      line: undeclared.line,
      column: undeclared.column,
    };
  }

  const parser = new XMLParser(parserOptions);
  const document = createElement(DOCUMENT_NODE);
  appendOrderedNodes(parser.parse(text), document);

  if (childElements(document).length > 1) {
    return { ok: false, message: "Multiple root elements" };
  }
  if (document.children.some((node) => typeof node === "string" && node.trim() !== "")) {
    return { ok: false, message: "Text outside the root element" };
  }
  return { ok: true, document };
}

// ============================================================================
// Relaxed
// ============================================================================

/**
 * Parses markup of any quality into a tree.
 */
export function parseLenientTree(text: string): XmlElement {
  const document = createElement(DOCUMENT_NODE);
  const stack: XmlElement[] = [document];
  let inCdata = false;

  const current = (): XmlElement => stack[stack.length - 1];

  const parser = new Parser(
    {
      onopentag(name, attribs) {
        const attributes: Record<string, string> = {};
        for (const [key, value] of Object.entries(attribs)) {
          attributes[key.toLowerCase()] = decode(value);
        }
        const element = createElement(name, attributes);
        current().children.push(element);
        stack.push(element);
      },

      ontext(data) {
        current().children.push(inCdata ? data : decode(data));
      },

      oncdatastart() {
        inCdata = true;
      },

      oncdataend() {
        inCdata = false;
      },

      // Mismatched and unclosed tags arrive here as implied closes, innermost first
      onclosetag(name) {
        if (stack.length > 1 && current().name === name.toLowerCase()) {
          stack.pop();
        }
      },
    },
    {
      xmlMode: true,
      decodeEntities: false,
      lowerCaseTags: true,
      lowerCaseAttributeNames: true,
      recognizeCDATA: true,
    }
  );

  parser.write(text);
  parser.end();
  return document;
}
