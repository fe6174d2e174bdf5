/**
 * Unit tests for canonical timestamps.
 */

import { describe, it, expect } from "vitest";
import {
  fromDate,
  fromFields,
  fromTuple,
  isCanonicalTimestamp,
  isTimestampTuple,
  toDate,
  toTuple,
} from "@/server/dates/timestamp";

describe("fromFields", () => {
  it("derives weekday and day-of-year", () => {
    const timestamp = fromFields({ year: 2004, month: 2, day: 29, hour: 12 });

    expect(timestamp).toEqual({
      year: 2004,
      month: 2,
      day: 29,
      hour: 12,
      minute: 0,
      second: 0,
      weekday: 6,
      yearDay: 60,
      isDst: 0,
    });
  });

  it("carries a leap second into the next minute", () => {
    const timestamp = fromFields({ year: 2004, month: 1, day: 1, hour: 23, minute: 59, second: 60 });
    expect(timestamp && toTuple(timestamp)).toEqual([2004, 1, 2, 0, 0, 0, 4, 2, 0]);
  });

  it("subtracts the zone offset", () => {
    const timestamp = fromFields({ year: 2004, month: 1, day: 1, hour: 1 }, 120);
    expect(timestamp && toTuple(timestamp)).toEqual([2003, 12, 31, 23, 0, 0, 2, 365, 0]);
  });

  it("keeps years below 100 as written", () => {
    expect(fromFields({ year: 50, month: 1, day: 1 })?.year).toBe(50);
  });

  it("returns undefined for unrepresentable values", () => {
    expect(fromFields({ year: 300000, month: 1, day: 1 })).toBeUndefined();
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(fromFields({ year: 2004, month: 1, day: 1 }))).toBe(true);
  });
});

describe("tuple conversion", () => {
  it("recomputes weekday and day-of-year from the first six fields", () => {
    const timestamp = fromTuple([2004, 1, 1, 19, 48, 21, 0, 0, 0]);
    expect(timestamp && toTuple(timestamp)).toEqual([2004, 1, 1, 19, 48, 21, 3, 1, 0]);
  });

  it("converts to and from Date", () => {
    const date = new Date(Date.UTC(2015, 9, 21, 7, 28, 0));
    expect(toDate(fromDate(date)).getTime()).toBe(date.getTime());
  });
});

describe("type guards", () => {
  it("recognizes nine-integer tuples", () => {
    expect(isTimestampTuple([2004, 1, 1, 0, 0, 0, 3, 1, 0])).toBe(true);
    expect(isTimestampTuple([2004, 1, 1])).toBe(false);
    expect(isTimestampTuple("2004-01-01")).toBe(false);
  });

  it("recognizes canonical timestamps", () => {
    expect(isCanonicalTimestamp(fromDate(new Date(0)))).toBe(true);
    expect(isCanonicalTimestamp({ year: 2004 })).toBe(false);
    expect(isCanonicalTimestamp(null)).toBe(false);
  });
});
