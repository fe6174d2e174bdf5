/**
 * RFC 822 family recognizers: RFC 822/1123/2822 dates, asctime() output, and
 * the slash-separated dates emitted by source-control change feeds.
 */

import { fromFields, type CanonicalTimestamp } from "./timestamp";
import { zoneOffsetMinutes } from "./timezones";

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const DAY_NAMES = ["mon", "tue", "wed", "thu", "fri", "sat", "sun"];

/**
 * Resolves an English month name or abbreviation of at least three letters
 * ("Jan", "Sept", "January") to 1-12.
 */
export function monthFromName(name: string): number | undefined {
  const token = name.toLowerCase().replace(/[.,]+$/, "");
  if (token.length < 3 || !/^[a-z]+$/.test(token)) {
    return undefined;
  }
  const index = MONTH_NAMES.findIndex((month) => month.startsWith(token));
  return index === -1 ? undefined : index + 1;
}

/**
 * Expands a two-digit year: 00-69 are 2000-2069, 70-99 are 1970-1999.
 */
export function expandTwoDigitYear(year: number): number {
  return year + (year < 70 ? 2000 : 1900);
}

function isWeekdayToken(token: string): boolean {
  if (/[,.]$/.test(token)) {
    return true;
  }
  return /^[a-z]+$/i.test(token) && DAY_NAMES.includes(token.slice(0, 3).toLowerCase());
}

const TIME_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?([+-]\d{4})?$/;

/**
 * Parses "Thu, 01 Jan 2004 19:48:21 GMT" and its relatives: the weekday,
 * seconds, time and zone are optional, years may have two digits, month
 * names may be spelled out, and day and month may be swapped.
 */
export function parseRfc822(text: string): CanonicalTimestamp | undefined {
  let tokens = text.trim().split(/\s+/);
  if (tokens[0] === "") {
    return undefined;
  }

  if (isWeekdayToken(tokens[0])) {
    tokens = tokens.slice(1);
  }
  // Trailing comments such as "(PST)" carry no information we use
  tokens = tokens.filter((token) => !/^\(.*\)$/.test(token));

  if (tokens.length < 3 || tokens.length > 5) {
    return undefined;
  }

  let [dayToken, monthToken] = tokens;
  const [, , yearToken, timeToken, zoneToken] = tokens;

  let month = monthFromName(monthToken);
  if (month === undefined) {
    month = monthFromName(dayToken);
    [dayToken, monthToken] = [monthToken, dayToken];
  }
  if (month === undefined) {
    return undefined;
  }

  const dayMatch = dayToken.match(/^(\d{1,2}),?$/);
  const yearMatch = yearToken.match(/^(\d{4}|\d{2}),?$/);
  if (!dayMatch || !yearMatch) {
    return undefined;
  }

  let year = parseInt(yearMatch[1], 10);
  if (yearMatch[1].length === 2) {
    year = expandTwoDigitYear(year);
  }

  let hour = 0;
  let minute = 0;
  let second = 0;
  let zone: string | undefined;

  if (timeToken !== undefined) {
    const timeMatch = timeToken.match(TIME_PATTERN);
    if (!timeMatch) {
      return undefined;
    }
    hour = parseInt(timeMatch[1], 10);
    minute = parseInt(timeMatch[2], 10);
    second = timeMatch[3] ? parseInt(timeMatch[3], 10) : 0;
    zone = timeMatch[4] ?? zoneToken;
  }

  const offset = zoneOffsetMinutes(zone);
  if (offset === undefined) {
    return undefined;
  }

  const day = parseInt(dayMatch[1], 10);
  if (day < 1 || day > 31) {
    return undefined;
  }

  return fromFields({ year, month, day, hour, minute, second }, offset);
}

const ASCTIME_PATTERN =
  /^(?:[a-z]{3,}\.?,?\s+)?([a-z]{3,})\.?\s+(\d{1,2})\s+(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s+([a-z][\w/]*|[+-]\d{4}))?\s+(\d{4})$/i;

/**
 * Parses asctime()-style dates: "Sun Jan  4 16:29:06 PST 2004".
 */
export function parseAsctime(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(ASCTIME_PATTERN);
  if (!match) {
    return undefined;
  }

  const month = monthFromName(match[1]);
  const offset = zoneOffsetMinutes(match[6]);
  if (month === undefined || offset === undefined) {
    return undefined;
  }

  return fromFields(
    {
      year: parseInt(match[7], 10),
      month,
      day: parseInt(match[2], 10),
      hour: parseInt(match[3], 10),
      minute: parseInt(match[4], 10),
      second: match[5] ? parseInt(match[5], 10) : 0,
    },
    offset
  );
}

const CHANGE_FEED_PATTERN =
  /^([a-z]{0,3}), (\d{4})\/(\d{1,2})\/(\d{1,2}) (\d{1,2}):(\d{2}):(\d{2}) ([a-z]+)$/i;

/**
 * Parses source-control change feed dates: "Fri, 2006/09/15 08:19:53 EDT".
 */
export function parseChangeFeedDate(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(CHANGE_FEED_PATTERN);
  if (!match) {
    return undefined;
  }

  const month = parseInt(match[3], 10);
  const offset = zoneOffsetMinutes(match[8]);
  if (month < 1 || month > 12 || offset === undefined) {
    return undefined;
  }

  return fromFields(
    {
      year: parseInt(match[2], 10),
      month,
      day: parseInt(match[4], 10),
      hour: parseInt(match[5], 10),
      minute: parseInt(match[6], 10),
      second: parseInt(match[7], 10),
    },
    offset
  );
}
