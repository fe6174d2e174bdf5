/**
 * Canonical UTC calendar values.
 *
 * Every recognizer hands its raw fields to fromFields(), which carries
 * out-of-range components (61 seconds, 25 hours, June 31) through real
 * calendar arithmetic before deriving weekday and day-of-year.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A fully resolved UTC calendar value.
 *
 * `weekday` counts from Monday = 0 and `yearDay` from January 1 = 1.
 * `isDst` is always 0 because the value is in UTC.
 */
export interface CanonicalTimestamp {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly weekday: number;
  readonly yearDay: number;
  readonly isDst: 0;
}

/**
 * The nine-field tuple form: year, month, day, hour, minute, second,
 * weekday, day-of-year, DST flag.
 */
export type TimestampTuple = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
  number,
];

/**
 * Raw calendar fields as a recognizer extracted them, in local time of the
 * source's zone.
 */
export interface DateFields {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

/**
 * Builds a timestamp from local fields and the zone's offset from UTC in
 * minutes (east positive). Returns undefined if the fields do not form a
 * representable date.
 */
export function fromFields(fields: DateFields, offsetMinutes = 0): CanonicalTimestamp | undefined {
  const date = new Date(0);
  // setUTCFullYear, unlike Date.UTC, does not map years 0-99 onto 1900-1999
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  date.setUTCHours(fields.hour ?? 0, (fields.minute ?? 0) - offsetMinutes, fields.second ?? 0, 0);

  if (isNaN(date.getTime())) {
    return undefined;
  }
  return fromDate(date);
}

/**
 * Converts a Date into its canonical UTC fields.
 */
export function fromDate(date: Date): CanonicalTimestamp {
  const year = date.getUTCFullYear();
  const startOfYear = new Date(0);
  startOfYear.setUTCFullYear(year, 0, 1);

  return Object.freeze({
    year,
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
    hour: date.getUTCHours(),
    minute: date.getUTCMinutes(),
    second: date.getUTCSeconds(),
    weekday: (date.getUTCDay() + 6) % 7,
    yearDay: Math.floor((date.getTime() - startOfYear.getTime()) / DAY_MS) + 1,
    isDst: 0,
  });
}

/**
 * Builds a timestamp from a nine-field tuple. Only the first six fields are
 * read; weekday and day-of-year are recomputed.
 */
export function fromTuple(tuple: TimestampTuple): CanonicalTimestamp | undefined {
  const [year, month, day, hour, minute, second] = tuple;
  return fromFields({ year, month, day, hour, minute, second });
}

export function toTuple(timestamp: CanonicalTimestamp): TimestampTuple {
  return [
    timestamp.year,
    timestamp.month,
    timestamp.day,
    timestamp.hour,
    timestamp.minute,
    timestamp.second,
    timestamp.weekday,
    timestamp.yearDay,
    timestamp.isDst,
  ];
}

export function toDate(timestamp: CanonicalTimestamp): Date {
  const date = new Date(0);
  date.setUTCFullYear(timestamp.year, timestamp.month - 1, timestamp.day);
  date.setUTCHours(timestamp.hour, timestamp.minute, timestamp.second, 0);
  return date;
}

/**
 * Narrows an arbitrary value to a timestamp tuple.
 */
export function isTimestampTuple(value: unknown): value is TimestampTuple {
  return (
    Array.isArray(value) &&
    value.length === 9 &&
    value.every((part) => typeof part === "number" && Number.isInteger(part))
  );
}

/**
 * Narrows an arbitrary value to a canonical timestamp.
 */
export function isCanonicalTimestamp(value: unknown): value is CanonicalTimestamp {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const fields = ["year", "month", "day", "hour", "minute", "second", "weekday", "yearDay"];
  return fields.every((field) => typeof Reflect.get(value, field) === "number");
}
