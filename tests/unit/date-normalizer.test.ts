/**
 * Unit tests for date normalization.
 *
 * Each dialect is checked through normalizeDate() so the recognizer order
 * is exercised too; expected values are nine-field UTC tuples
 * (year, month, day, hour, minute, second, weekday, day-of-year, DST).
 */

import { describe, it, expect } from "vitest";
import {
  createDateNormalizer,
  DEFAULT_DATE_RECOGNIZERS,
  normalizeDate,
  type DateRecognizer,
} from "@/server/dates/normalizer";
import { fromFields, toTuple } from "@/server/dates/timestamp";
import { parseIso8601 } from "@/server/dates/iso8601";

function normalizeToTuple(text: string): readonly number[] | undefined {
  const timestamp = normalizeDate(text);
  return timestamp ? toTuple(timestamp) : undefined;
}

describe("normalizeDate", () => {
  describe("RFC 822", () => {
    it.each([
      ["Thu, 01 Jan 2004 19:48:21 GMT", [2004, 1, 1, 19, 48, 21, 3, 1, 0]],
      ["Thu, 01 Jan 04 19:48:21 GMT", [2004, 1, 1, 19, 48, 21, 3, 1, 0]],
      ["Thu, 01 Jan 2004 19:48:21 EST", [2004, 1, 2, 0, 48, 21, 4, 2, 0]],
      ["Thu, 01 January 2004 19:48 +0100", [2004, 1, 1, 18, 48, 0, 3, 1, 0]],
      ["Jan 01 2004 19:48:21 GMT", [2004, 1, 1, 19, 48, 21, 3, 1, 0]],
      ["01 Jan 2004", [2004, 1, 1, 0, 0, 0, 3, 1, 0]],
      ["Thu, 01 Jan 2004 19:48:21 XYZ", [2004, 1, 1, 19, 48, 21, 3, 1, 0]],
    ])("parses %s", (text, expected) => {
      expect(normalizeToTuple(text)).toEqual(expected);
    });

    it.each([
      ["AT", [2004, 1, 26, 20, 31, 0, 0, 26, 0]],
      ["ET", [2004, 1, 26, 21, 31, 0, 0, 26, 0]],
      ["CT", [2004, 1, 26, 22, 31, 0, 0, 26, 0]],
      ["MT", [2004, 1, 26, 23, 31, 0, 0, 26, 0]],
      ["PT", [2004, 1, 27, 0, 31, 0, 1, 27, 0]],
    ])("applies the single-region zone %s", (zone, expected) => {
      expect(normalizeToTuple(`Mon, 26 January 2004 16:31:00 ${zone}`)).toEqual(expected);
    });

    it("accepts Etc/ zone names", () => {
      expect(normalizeToTuple("Thu, 01 Jan 2004 00:00 Etc/GMT")).toEqual([
        2004, 1, 1, 0, 0, 0, 3, 1, 0,
      ]);
    });

    it("carries an out-of-range day into the next month", () => {
      expect(normalizeToTuple("Thu, 31 Jun 2004 19:48:21 GMT")).toEqual([
        2004, 7, 1, 19, 48, 21, 3, 183, 0,
      ]);
    });
  });

  describe("asctime", () => {
    it("parses asctime output with a zone", () => {
      expect(normalizeToTuple("Sun Jan  4 16:29:06 PST 2004")).toEqual([
        2004, 1, 5, 0, 29, 6, 0, 5, 0,
      ]);
    });
  });

  describe("change feed dates", () => {
    it("parses slash-separated dates", () => {
      expect(normalizeToTuple("Fri, 2006/09/15 08:19:53 EDT")).toEqual([
        2006, 9, 15, 12, 19, 53, 4, 258, 0,
      ]);
    });
  });

  describe("W3DTF", () => {
    it.each([
      ["2003-12-31T10:14:55Z", [2003, 12, 31, 10, 14, 55, 2, 365, 0]],
      ["2003-12-31T10:14:55-08:00", [2003, 12, 31, 18, 14, 55, 2, 365, 0]],
      ["2003-12-31T10:14:55.123+01:00", [2003, 12, 31, 9, 14, 55, 2, 365, 0]],
      ["2003-12", [2003, 12, 1, 0, 0, 0, 0, 335, 0]],
      ["2003", [2003, 1, 1, 0, 0, 0, 2, 1, 0]],
      ["2003-335", [2003, 12, 1, 0, 0, 0, 0, 335, 0]],
      ["2003-12-31T25:14:55Z", [2004, 1, 1, 1, 14, 55, 3, 1, 0]],
      ["2003-12-31T10:61:55Z", [2003, 12, 31, 11, 1, 55, 2, 365, 0]],
      ["2003-12-31T10:14:61Z", [2003, 12, 31, 10, 15, 1, 2, 365, 0]],
      ["2004-02-28T18:14:55-08:00", [2004, 2, 29, 2, 14, 55, 6, 60, 0]],
      ["2000-02-28T18:14:55-08:00", [2000, 2, 29, 2, 14, 55, 1, 60, 0]],
      ["2003-02-28T18:14:55-08:00", [2003, 3, 1, 2, 14, 55, 5, 60, 0]],
    ])("parses %s", (text, expected) => {
      expect(normalizeToTuple(text)).toEqual(expected);
    });

    it("repairs a zero-padded three-digit month", () => {
      expect(normalizeToTuple("2003-012-31T10:14:55Z")).toEqual([
        2003, 12, 31, 10, 14, 55, 2, 365, 0,
      ]);
    });
  });

  describe("localized dialects", () => {
    it("parses Greek weekday and month names", () => {
      expect(normalizeToTuple("Κυρ, 11 Ιούλ 2004 12:00:00 EST")).toEqual([
        2004, 7, 11, 17, 0, 0, 6, 193, 0,
      ]);
    });

    it("parses Hungarian month names with unpadded fields", () => {
      expect(normalizeToTuple("2004-július-13T9:15-05:00")).toEqual([
        2004, 7, 13, 14, 15, 0, 1, 195, 0,
      ]);
    });

    it("parses Korean year-month-day dates as Korea Standard Time", () => {
      expect(normalizeToTuple("2004년 05월 28일  01:31:15")).toEqual([
        2004, 5, 27, 16, 31, 15, 3, 148, 0,
      ]);
    });

    it("parses Korean afternoon times", () => {
      expect(normalizeToTuple("2004-05-25 오후 11:23:17")).toEqual([
        2004, 5, 25, 14, 23, 17, 1, 146, 0,
      ]);
    });

    it("parses zone-less SQL datetimes as Korea Standard Time", () => {
      expect(normalizeToTuple("2004-07-08 23:56:58")).toEqual([
        2004, 7, 8, 14, 56, 58, 3, 190, 0,
      ]);
      expect(normalizeToTuple("2004-07-08 23:56:58.0")).toEqual([
        2004, 7, 8, 14, 56, 58, 3, 190, 0,
      ]);
    });
  });

  describe("general ISO 8601", () => {
    it.each([
      ["-0312", [2003, 12, 1, 0, 0, 0, 0, 335, 0]],
      ["03335", [2003, 12, 1, 0, 0, 0, 0, 335, 0]],
    ])("parses %s", (text, expected) => {
      expect(normalizeToTuple(text)).toEqual(expected);
    });
  });

  describe("unrecognized input", () => {
    it.each(["", "   ", "not a date", "Thu, 01 Foo 2004 19:48:21 GMT", "0999-01-01"])(
      "returns undefined for %j",
      (text) => {
        expect(normalizeDate(text)).toBeUndefined();
      }
    );

    it("returns undefined for null and undefined", () => {
      expect(normalizeDate(null)).toBeUndefined();
      expect(normalizeDate(undefined)).toBeUndefined();
    });

    it("rejects a malformed numeric zone", () => {
      expect(normalizeDate("Thu, 01 Jan 2004 19:48:21 +1075")).toBeUndefined();
    });
  });
});

describe("createDateNormalizer", () => {
  it("treats a throwing recognizer as declining", () => {
    const fixed = fromFields({ year: 2010, month: 6, day: 15 });
    const recognizers: DateRecognizer[] = [
      {
        name: "broken",
        tryParse: () => {
          throw new Error("recognizer bug");
        },
      },
      { name: "fixed", tryParse: () => fixed },
    ];

    expect(createDateNormalizer(recognizers)("anything")).toBe(fixed);
  });

  it("lets callers put their own recognizer first", () => {
    const fixed = fromFields({ year: 1999, month: 12, day: 31 });
    const normalize = createDateNormalizer([
      { name: "always", tryParse: () => fixed },
      ...DEFAULT_DATE_RECOGNIZERS,
    ]);

    expect(normalize("Thu, 01 Jan 2004 19:48:21 GMT")).toBe(fixed);
  });

  it("returns undefined when no recognizer accepts the text", () => {
    expect(createDateNormalizer([])("2003-12-31T10:14:55Z")).toBeUndefined();
  });
});

describe("parseIso8601", () => {
  const now = new Date(Date.UTC(2026, 9, 19, 12, 0, 0));

  function parts(text: string): [number, number, number] | undefined {
    const timestamp = parseIso8601(text, now);
    return timestamp ? [timestamp.year, timestamp.month, timestamp.day] : undefined;
  }

  it.each([
    ["031231", [2003, 12, 31]],
    ["03-12-31", [2003, 12, 31]],
    ["-03-12", [2003, 12, 1]],
    ["--05-17", [2026, 5, 17]],
    ["--05", [2026, 5, 1]],
    ["---17", [2026, 10, 17]],
    ["-335", [2026, 12, 1]],
    ["2003-12-31T10:14Z", [2003, 12, 31]],
  ])("parses %s", (text, expected) => {
    expect(parts(text)).toEqual(expected);
  });

  it("applies the zone offset", () => {
    const timestamp = parseIso8601("2003-12-31T23:30-02:00", now);
    expect(timestamp && toTuple(timestamp)).toEqual([2004, 1, 1, 1, 30, 0, 3, 1, 0]);
  });

  it("rejects an ordinal day beyond 366", () => {
    expect(parseIso8601("2003-367", now)).toBeUndefined();
  });
});
