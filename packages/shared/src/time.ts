import { DateTime } from "luxon";

const OFFSET_SUFFIX_REGEX = /(Z|[+-]\d{2}:\d{2})$/;
const UTC_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export interface UtcRange {
  startIso: string;
  endIso: string;
}

function parseIsoDateTime(value: string): DateTime {
  return DateTime.fromISO(value, { setZone: true });
}

function requireIso(value: DateTime, failure: string): string {
  const iso = value.toUTC().toISO();
  if (!iso) {
    throw new Error(failure);
  }
  return iso;
}

export function utcNowIso(): string {
  return requireIso(DateTime.utc(), "Failed to generate current UTC timestamp");
}

export function isIsoDateTimeWithOffset(value: string): boolean {
  if (!OFFSET_SUFFIX_REGEX.test(value)) return false;
  return parseIsoDateTime(value).isValid;
}

export function parseIsoToEpochMillis(value: string): number {
  if (!isIsoDateTimeWithOffset(value)) {
    throw new Error(
      "Datetime must be ISO-8601 with explicit timezone offset (Z or +HH:MM)",
    );
  }

  return parseIsoDateTime(value).toMillis();
}

export function epochSecondsToUtcIso(seconds: number): string {
  return requireIso(
    DateTime.fromSeconds(seconds, { zone: "utc" }),
    "Failed to convert epoch seconds to UTC ISO timestamp",
  );
}

export function isoToEpochSeconds(value: string): number {
  return Math.floor(parseIsoToEpochMillis(value) / 1000);
}

export function addSecondsToIso(value: string, seconds: number): string {
  const baseMillis = parseIsoToEpochMillis(value);
  return requireIso(
    DateTime.fromMillis(baseMillis + seconds * 1000, { zone: "utc" }),
    "Failed to add seconds to ISO timestamp",
  );
}

export function addDaysToIso(value: string, days: number): string {
  return requireIso(
    parseIsoDateTime(value).toUTC().plus({ days }),
    "Failed to add days to ISO timestamp",
  );
}

export function isUtcDateString(value: string): boolean {
  if (!UTC_DATE_REGEX.test(value)) return false;
  return DateTime.fromISO(value, { zone: "utc" }).isValid;
}

export function toUtcDateString(value: string): string {
  const date = parseIsoDateTime(value).toUTC().toISODate();
  if (!date) {
    throw new Error(`Invalid ISO timestamp: ${value}`);
  }
  return date;
}

export function previousUtcDate(nowIso: string): string {
  return toUtcDateString(addDaysToIso(nowIso, -1));
}

/**
 * Whole-second bounds of a UTC calendar day, inclusive on both ends
 * (00:00:00 through 23:59:59).
 */
export function utcDayRange(date: string): UtcRange {
  if (!isUtcDateString(date)) {
    throw new Error(`Usage date must be YYYY-MM-DD, received: ${date}`);
  }

  const start = DateTime.fromISO(date, { zone: "utc" }).startOf("day");
  const end = start.endOf("day").set({ millisecond: 0 });

  return {
    startIso: requireIso(start, "Failed to compute start of day"),
    endIso: requireIso(end, "Failed to compute end of day"),
  };
}

export function utcMonthRange(atIso: string): UtcRange {
  const at = parseIsoDateTime(atIso).toUTC();
  const start = at.startOf("month");
  const end = at.endOf("month").set({ millisecond: 0 });

  return {
    startIso: requireIso(start, "Failed to compute start of month"),
    endIso: requireIso(end, "Failed to compute end of month"),
  };
}

export function isBefore(leftIso: string, rightIso: string): boolean {
  return parseIsoToEpochMillis(leftIso) < parseIsoToEpochMillis(rightIso);
}

export function laterOf(leftIso: string, rightIso: string): string {
  return isBefore(leftIso, rightIso) ? rightIso : leftIso;
}

export function earlierOf(leftIso: string, rightIso: string): string {
  return isBefore(leftIso, rightIso) ? leftIso : rightIso;
}
