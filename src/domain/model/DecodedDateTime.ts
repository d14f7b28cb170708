/**
 * Calendar components produced by a format rule.
 *
 * Kept as plain components rather than a `Date` so that values such as the
 * spreadsheet serial day 60 (1900-02-29) survive decoding and formatting.
 */
export interface DecodedDateTime {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  /** Whether the source value carried a time-of-day component. */
  readonly hasTime: boolean;
}

/** Days in each month (non-leap year), 1-indexed. */
const DAYS_IN_MONTH = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(month: number, year: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29;
  }
  return DAYS_IN_MONTH[month] ?? 0;
}

/** Check calendar and clock ranges. Month and day must exist in the given year. */
export function isValidDateTime(value: DecodedDateTime): boolean {
  if (value.year < 1 || value.year > 9999) return false;
  if (value.month < 1 || value.month > 12) return false;
  if (value.day < 1 || value.day > daysInMonth(value.month, value.year)) return false;
  if (value.hour < 0 || value.hour > 23) return false;
  if (value.minute < 0 || value.minute > 59) return false;
  if (value.second < 0 || value.second > 59) return false;
  return true;
}

/** Midnight-padded copy of a date-only value. */
export function withMidnight(value: DecodedDateTime): DecodedDateTime {
  return { ...value, hour: 0, minute: 0, second: 0, hasTime: true };
}

/** Copy of a value with its time-of-day removed. */
export function withoutTime(value: DecodedDateTime): DecodedDateTime {
  return { ...value, hour: 0, minute: 0, second: 0, hasTime: false };
}
