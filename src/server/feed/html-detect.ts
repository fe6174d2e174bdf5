/**
 * Guesses whether feed text is HTML or plain text.
 *
 * RSS gives no content type for descriptions, so the guess decides whether
 * a summary is reported as text/html or text/plain.
 */

import { readFileSync } from "node:fs";
import { decode } from "html-entities";
import { z } from "zod";

const elementListSchema = z.array(z.string().min(1));

let acceptableElements: ReadonlySet<string> | undefined;

function getAcceptableElements(): ReadonlySet<string> {
  if (!acceptableElements) {
    const raw = readFileSync(new URL("./data/acceptable-elements.json", import.meta.url), "utf-8");
    acceptableElements = new Set(elementListSchema.parse(JSON.parse(raw)));
  }
  return acceptableElements;
}

const CLOSING_TAG_PATTERN = /<\/(\w+)>/;
const ENTITY_PATTERN = /&#?\w+;/;
const TAG_NAME_PATTERN = /<\/?(\w+)/g;
const NAMED_ENTITY_PATTERN = /&(\w+);/g;

function isKnownEntity(name: string): boolean {
  const reference = `&${name};`;
  return decode(reference) !== reference;
}

/**
 * Returns true when the text has at least one closing tag or entity
 * reference, uses only elements that are safe in feed content, and only
 * known named entities.
 *
 * @example
 * looksLikeHtml("<b>bold</b>"); // true
 * looksLikeHtml("AT&T"); // false
 * looksLikeHtml("<code>"); // false, no end tag
 */
export function looksLikeHtml(text: string): boolean {
  if (!CLOSING_TAG_PATTERN.test(text) && !ENTITY_PATTERN.test(text)) {
    return false;
  }

  const elements = getAcceptableElements();
  for (const match of text.matchAll(TAG_NAME_PATTERN)) {
    if (!elements.has(match[1].toLowerCase())) {
      return false;
    }
  }

  for (const match of text.matchAll(NAMED_ENTITY_PATTERN)) {
    if (!isKnownEntity(match[1])) {
      return false;
    }
  }

  return true;
}
