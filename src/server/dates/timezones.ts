/**
 * Timezone designators found in feed dates.
 */

/**
 * Offsets from UTC in minutes for named zones. Includes the informal
 * single-region names (AT, ET, CT, MT, PT) some publishers emit.
 */
const NAMED_ZONE_OFFSETS: Record<string, number> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  AST: -4 * 60,
  ADT: -3 * 60,
  EST: -5 * 60,
  EDT: -4 * 60,
  CST: -6 * 60,
  CDT: -5 * 60,
  MST: -7 * 60,
  MDT: -6 * 60,
  PST: -8 * 60,
  PDT: -7 * 60,
  AT: -4 * 60,
  ET: -5 * 60,
  CT: -6 * 60,
  MT: -7 * 60,
  PT: -8 * 60,
};

const NUMERIC_ZONE = /^([+-])(\d{2}):?(\d{2})$/;
const HOURS_ONLY_ZONE = /^([+-])(\d{1,2})$/;

/**
 * Resolves a zone designator to minutes east of UTC.
 *
 * Absent designators and names outside the table resolve to 0 (UTC).
 * A malformed numeric designator returns undefined so the caller can
 * decline the whole date.
 */
export function zoneOffsetMinutes(zone: string | undefined): number | undefined {
  if (!zone) {
    return 0;
  }

  let designator = zone.trim();
  if (/^etc\//i.test(designator)) {
    designator = designator.slice(4);
  }
  if (!designator) {
    return 0;
  }

  const numeric = designator.match(NUMERIC_ZONE) ?? designator.match(HOURS_ONLY_ZONE);
  if (numeric) {
    const sign = numeric[1] === "-" ? -1 : 1;
    const hours = parseInt(numeric[2], 10);
    const minutes = numeric[3] ? parseInt(numeric[3], 10) : 0;
    if (minutes >= 60) {
      return undefined;
    }
    return sign * (hours * 60 + minutes);
  }

  if (/^[+-]/.test(designator)) {
    return undefined;
  }

  return NAMED_ZONE_OFFSETS[designator.toUpperCase()] ?? 0;
}
