/**
 * W3C Date and Time Formats (the ISO 8601 profile Atom and Dublin Core use).
 *
 * Accepts year-only, year-month, full dates, ordinal dates, and full
 * timestamps with optional fractional seconds. Out-of-range hours, minutes
 * and seconds are carried rather than rejected.
 */

import { fromFields, type CanonicalTimestamp } from "./timestamp";
import { zoneOffsetMinutes } from "./timezones";

const W3DTF_PATTERN =
  /^(\d{4})(?:(-?)(?:(\d{2})(?:\2(\d{2}))?|(\d{3})))?(?:T(\d{2})(:?)(\d{2})(?:\7(\d{2})(?:[.,]\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export function parseW3dtf(text: string): CanonicalTimestamp | undefined {
  const match = text.trim().match(W3DTF_PATTERN);
  if (!match) {
    return undefined;
  }

  const [, yearText, , monthText, dayText, ordinalText, hourText, , minuteText, secondText, zone] =
    match;

  const year = parseInt(yearText, 10);
  if (year < 1000) {
    return undefined;
  }

  let month = 1;
  let day = 1;
  if (ordinalText) {
    day = parseInt(ordinalText, 10);
    if (day < 1 || day > 366) {
      return undefined;
    }
  } else {
    if (monthText) {
      month = parseInt(monthText, 10);
    }
    if (dayText) {
      day = parseInt(dayText, 10);
    }
    if (month < 1 || month > 12 || day < 1 || day > 31) {
      return undefined;
    }
  }

  const offset = zoneOffsetMinutes(zone);
  if (offset === undefined) {
    return undefined;
  }

  return fromFields(
    {
      year,
      month,
      day,
      hour: hourText ? parseInt(hourText, 10) : 0,
      minute: minuteText ? parseInt(minuteText, 10) : 0,
      second: secondText ? parseInt(secondText, 10) : 0,
    },
    offset
  );
}
