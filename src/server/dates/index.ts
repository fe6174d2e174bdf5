export {
  type CanonicalTimestamp,
  type TimestampTuple,
  type DateFields,
  fromFields,
  fromDate,
  fromTuple,
  toTuple,
  toDate,
  isTimestampTuple,
  isCanonicalTimestamp,
} from "./timestamp";
export { zoneOffsetMinutes } from "./timezones";
export { parseRfc822, parseAsctime, parseChangeFeedDate, monthFromName } from "./rfc822";
export { parseW3dtf } from "./w3dtf";
export { parseIso8601, parsePaddedMonthDate } from "./iso8601";
export {
  parseGreekDate,
  parseHungarianDate,
  parseKoreanMeridiem,
  parseKoreanYearMonthDay,
  parseSqlDateTime,
} from "./locale";
export {
  type DateRecognizer,
  type DateNormalizer,
  DEFAULT_DATE_RECOGNIZERS,
  createDateNormalizer,
  normalizeDate,
} from "./normalizer";
