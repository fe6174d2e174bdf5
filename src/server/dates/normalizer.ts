/**
 * Date normalization.
 *
 * Feeds carry dates in dozens of dialects. The normalizer tries an ordered
 * list of recognizers and returns the first canonical UTC value produced.
 * A recognizer that throws is treated as having declined.
 */

import { logger } from "../../lib/logger";
import { parseIso8601, parsePaddedMonthDate } from "./iso8601";
import {
  parseGreekDate,
  parseHungarianDate,
  parseKoreanMeridiem,
  parseKoreanYearMonthDay,
  parseSqlDateTime,
} from "./locale";
import { parseAsctime, parseChangeFeedDate, parseRfc822 } from "./rfc822";
import type { CanonicalTimestamp } from "./timestamp";
import { parseW3dtf } from "./w3dtf";

/**
 * A single date dialect. Returns undefined when the text is not in its
 * dialect.
 */
export interface DateRecognizer {
  readonly name: string;
  tryParse(text: string): CanonicalTimestamp | undefined;
}

export type DateNormalizer = (text: string | null | undefined) => CanonicalTimestamp | undefined;

function recognizer(
  name: string,
  tryParse: (text: string) => CanonicalTimestamp | undefined
): DateRecognizer {
  return { name, tryParse };
}

/**
 * The built-in recognizers, most specific first. The order matters: the
 * zone-less SQL form would otherwise swallow dates a more specific
 * recognizer reads with the right zone.
 */
export const DEFAULT_DATE_RECOGNIZERS: readonly DateRecognizer[] = Object.freeze([
  recognizer("change-feed", parseChangeFeedDate),
  recognizer("rfc822", parseRfc822),
  recognizer("asctime", parseAsctime),
  recognizer("w3dtf", parseW3dtf),
  recognizer("hungarian", parseHungarianDate),
  recognizer("greek", parseGreekDate),
  recognizer("sql", parseSqlDateTime),
  recognizer("korean-meridiem", parseKoreanMeridiem),
  recognizer("korean-ymd", parseKoreanYearMonthDay),
  recognizer("padded-month", parsePaddedMonthDate),
  recognizer("iso8601", (text) => parseIso8601(text)),
]);

/**
 * Builds a normalizer over the given recognizers, tried in order.
 *
 * @example
 * const normalize = createDateNormalizer([myRecognizer, ...DEFAULT_DATE_RECOGNIZERS]);
 * normalize("Thu, 01 Jan 2004 19:48:21 GMT");
 */
export function createDateNormalizer(
  recognizers: readonly DateRecognizer[] = DEFAULT_DATE_RECOGNIZERS
): DateNormalizer {
  return (text) => {
    if (!text || !text.trim()) {
      return undefined;
    }

    for (const candidate of recognizers) {
      try {
        const result = candidate.tryParse(text);
        if (result) {
          return result;
        }
      } catch (error) {
        logger.debug("Date recognizer failed", {
          recognizer: candidate.name,
          text,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return undefined;
  };
}

/**
 * Normalizes a date string with the built-in recognizers.
 */
export const normalizeDate: DateNormalizer = createDateNormalizer();
