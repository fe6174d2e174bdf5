/**
 * Recognizers for localized date dialects seen in the wild: Greek and
 * Hungarian month names, and the formats common on Korean blog hosts.
 *
 * Each one rewrites its input into RFC 822 or W3DTF and delegates, so zone
 * handling and calendar carry rules stay in one place.
 */

import type { CanonicalTimestamp } from "./timestamp";
import { parseRfc822 } from "./rfc822";
import { parseW3dtf } from "./w3dtf";

// ============================================================================
// Korean
// ============================================================================

/** Korean hosts publish these without a zone; they are Korea Standard Time. */
const KOREA_OFFSET = "+09:00";

/** "2004년 05월 28일  01:31:15" */
const KOREAN_YMD_PATTERN =
  /^(\d{4})년\s+(\d{2})월\s+(\d{2})일\s+(\d{2}):(\d{2}):(\d{2})$/;

/** "2004-05-25 오후 11:23:17" */
const KOREAN_MERIDIEM_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})\s+(오전|오후)\s+(\d{1,2}):(\d{2}):(\d{2})$/;

const KOREAN_PM = "오후";

/** "2004-07-08 23:56:58", optionally with fractional seconds */
const SQL_DATETIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?$/;

export function parseKoreanYearMonthDay(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(KOREAN_YMD_PATTERN);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match;
  return parseW3dtf(`${year}-${month}-${day}T${hour}:${minute}:${second}${KOREA_OFFSET}`);
}

export function parseKoreanMeridiem(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(KOREAN_MERIDIEM_PATTERN);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, meridiem, hourText, minute, second] = match;
  let hour = parseInt(hourText, 10);
  if (meridiem === KOREAN_PM) {
    hour += 12;
  }
  const paddedHour = String(hour).padStart(2, "0");
  return parseW3dtf(`${year}-${month}-${day}T${paddedHour}:${minute}:${second}${KOREA_OFFSET}`);
}

/**
 * Parses zone-less SQL DATETIME values. The hosts that emit these are
 * overwhelmingly Korean, so the value is read as Korea Standard Time.
 */
export function parseSqlDateTime(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(SQL_DATETIME_PATTERN);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second] = match;
  return parseW3dtf(`${year}-${month}-${day}T${hour}:${minute}:${second}${KOREA_OFFSET}`);
}

// ============================================================================
// Greek
// ============================================================================

const GREEK_MONTHS: Record<string, string> = {
  "Ιαν": "Jan",
  "Φεβ": "Feb",
  "Μάώ": "Mar",
  "Μαώ": "Mar",
  "Απρ": "Apr",
  "Μάι": "May",
  "Μαϊ": "May",
  "Μαι": "May",
  "Ιούν": "Jun",
  "Ιον": "Jun",
  "Ιούλ": "Jul",
  "Ιολ": "Jul",
  "Αύγ": "Aug",
  "Αυγ": "Aug",
  "Σεπ": "Sep",
  "Οκτ": "Oct",
  "Νοέ": "Nov",
  "Νοε": "Nov",
  "Δεκ": "Dec",
};

const GREEK_WEEKDAYS: Record<string, string> = {
  "Κυρ": "Sun",
  "Δευ": "Mon",
  "Τρι": "Tue",
  "Τετ": "Wed",
  "Πεμ": "Thu",
  "Παρ": "Fri",
  "Σαβ": "Sat",
};

const GREEK_DATE_PATTERN =
  /^([^,]+),\s+(\d{2})\s+(\S+)\s+(\d{4})\s+(\d{2}):(\d{2}):(\d{2})\s+(\S+)$/;

/**
 * Parses RFC 822 dates with Greek weekday and month abbreviations:
 * "Κυρ, 11 Ιούλ 2004 12:00:00 EST".
 */
export function parseGreekDate(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(GREEK_DATE_PATTERN);
  if (!match) {
    return undefined;
  }
  const [, weekdayName, day, monthName, year, hour, minute, second, zone] = match;
  const weekday = GREEK_WEEKDAYS[weekdayName];
  const month = GREEK_MONTHS[monthName];
  if (!weekday || !month) {
    return undefined;
  }
  return parseRfc822(`${weekday}, ${day} ${month} ${year} ${hour}:${minute}:${second} ${zone}`);
}

// ============================================================================
// Hungarian
// ============================================================================

const HUNGARIAN_MONTHS: Record<string, string> = {
  "január": "01",
  "február": "02",
  "februári": "02",
  "március": "03",
  "április": "04",
  "május": "05",
  "máujus": "05",
  "június": "06",
  "július": "07",
  augusztus: "08",
  szeptember: "09",
  "október": "10",
  november: "11",
  december: "12",
};

const HUNGARIAN_DATE_PATTERN = /^(\d{4})-([^-]+)-(\d{1,2})T(\d{1,2}):(\d{2})([+-]\d{1,2}:\d{2})$/;

/**
 * Parses W3DTF-shaped dates with a Hungarian month name and unpadded
 * fields: "2004-július-13T9:15-05:00".
 */
export function parseHungarianDate(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(HUNGARIAN_DATE_PATTERN);
  if (!match) {
    return undefined;
  }
  const [, year, monthName, day, hour, minute, zone] = match;
  const month = HUNGARIAN_MONTHS[monthName.toLowerCase()];
  if (!month) {
    return undefined;
  }
  const paddedZone = zone.replace(
    /^([+-])(\d):/,
    (_match, sign: string, hours: string) => `${sign}0${hours}:`
  );
  return parseW3dtf(
    `${year}-${month}-${day.padStart(2, "0")}T${hour.padStart(2, "0")}:${minute}${paddedZone}`
  );
}
