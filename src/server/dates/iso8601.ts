/**
 * General ISO 8601 recognizer, covering the reduced and truncated forms the
 * W3C profile leaves out: two-digit years, "-YY-MM", ordinal "YY-OOO",
 * "--MM-DD" and friends.
 *
 * Truncated forms take the missing leading parts from the current date.
 * Two-digit years belong to the current century.
 */

import { fromFields, type CanonicalTimestamp } from "./timestamp";
import { zoneOffsetMinutes } from "./timezones";
import { parseW3dtf } from "./w3dtf";

const DATE_TEMPLATES = [
  String.raw`(?<year>\d{4})-?(?<month>\d{2})-?(?<day>\d{2})`,
  String.raw`(?<year>\d{4})-(?<month>\d{2})`,
  String.raw`(?<year>\d{4})-?(?<ordinal>\d{3})`,
  String.raw`(?<yy>\d{2})-?(?<month>\d{2})-?(?<day>\d{2})`,
  String.raw`(?<yy>\d{2})-?(?<ordinal>\d{3})`,
  String.raw`(?<year>\d{4})`,
  String.raw`-(?<yy>\d{2})-?(?<month>\d{2})`,
  String.raw`-(?<ordinal>\d{3})`,
  String.raw`-(?<yy>\d{2})`,
  String.raw`--(?<month>\d{2})-?(?<day>\d{2})`,
  String.raw`--(?<month>\d{2})`,
  String.raw`---(?<day>\d{2})`,
];

const TIME_PART = String.raw`(?:T?(?<hour>\d{2}):(?<minute>\d{2})(?::(?<second>\d{2}))?(?:[.,]\d+)?)?`;
const ZONE_PART = String.raw`(?<zone>Z|[+-]\d{2}(?::?\d{2})?)?`;

const ISO8601_PATTERNS = DATE_TEMPLATES.map(
  (template) => new RegExp(`^${template}${TIME_PART}${ZONE_PART}$`)
);

function intOrUndefined(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parseInt(value, 10);
}

/**
 * Parses an ISO 8601 date against the template list, first match wins.
 *
 * @param now - Supplies the current year and month for truncated forms
 */
export function parseIso8601(text: string, now: Date = new Date()): CanonicalTimestamp | undefined {
  const trimmed = text.trim();
  if (!trimmed) {
    return undefined;
  }

  let groups: Record<string, string | undefined> | undefined;
  for (const pattern of ISO8601_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match) {
      groups = match.groups ?? {};
      break;
    }
  }
  if (!groups) {
    return undefined;
  }

  const century = Math.floor(now.getUTCFullYear() / 100) * 100;
  const twoDigitYear = intOrUndefined(groups.yy);
  const year =
    intOrUndefined(groups.year) ??
    (twoDigitYear !== undefined ? century + twoDigitYear : now.getUTCFullYear());
  if (year < 1000) {
    return undefined;
  }

  const ordinal = intOrUndefined(groups.ordinal);
  let month: number;
  let day: number;
  if (ordinal !== undefined) {
    if (ordinal < 1 || ordinal > 366) {
      return undefined;
    }
    month = 1;
    day = ordinal;
  } else {
    const explicitMonth = intOrUndefined(groups.month);
    // "---DD" keeps the current month; every other form without one means January
    month = explicitMonth ?? (groups.day !== undefined ? now.getUTCMonth() + 1 : 1);
    day = intOrUndefined(groups.day) ?? 1;
    if (month < 1 || month > 12 || day < 1 || day > 31) {
      return undefined;
    }
  }

  const offset = zoneOffsetMinutes(groups.zone);
  if (offset === undefined) {
    return undefined;
  }

  return fromFields(
    {
      year,
      month,
      day,
      hour: intOrUndefined(groups.hour) ?? 0,
      minute: intOrUndefined(groups.minute) ?? 0,
      second: intOrUndefined(groups.second) ?? 0,
    },
    offset
  );
}

const PADDED_MONTH_PATTERN = /^(\d{4})-0(\d{2})-(\d{2})(T.*)?$/;

/**
 * Parses dates with a zero-padded three-digit month ("2003-012-31T10:14:55Z"),
 * a quirk of one large publisher's feeds, by dropping the extra zero.
 */
export function parsePaddedMonthDate(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(PADDED_MONTH_PATTERN);
  if (!match) {
    return undefined;
  }
  const [, year, month, day, time] = match;
  return parseW3dtf(`${year}-${month}-${day}${time ?? ""}`);
}
