/**
 * DDM Status Kernel — Local Date-Time
 *
 * A timezone-less wall-clock reading. Enforcement deadlines are written to
 * the install log without an offset, so they are compared against the
 * current wall-clock reading in the same frame rather than against an
 * absolute instant.
 *
 * This module is side-effect free. `fromDate` reads the calendar fields of a
 * supplied Date; it never consults the system clock.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LocalDateTime {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31, valid for the month */
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const MS_PER_DAY = 86_400_000;

/**
 * Strict `YYYY-MM-DDTHH:MM:SS`. No fractional seconds, no `Z`, no offset.
 */
const LOCAL_DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})$/;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a `YYYY-MM-DDTHH:MM:SS` string.
 *
 * Returns null for anything that does not match the fixed format exactly or
 * names a date that does not exist on the calendar (e.g. `2026-02-30`).
 * Timezone-qualified timestamps are rejected.
 */
export function parseLocalDateTime(text: string): LocalDateTime | null {
  const match = LOCAL_DATE_TIME_PATTERN.exec(text);
  if (match === null) return null;

  const [, y, mo, d, h, mi, s] = match;
  if (
    y === undefined || mo === undefined || d === undefined ||
    h === undefined || mi === undefined || s === undefined
  ) {
    return null;
  }

  const value: LocalDateTime = {
    year: Number(y),
    month: Number(mo),
    day: Number(d),
    hour: Number(h),
    minute: Number(mi),
    second: Number(s),
  };

  return isValidLocalDateTime(value) ? value : null;
}

/**
 * True when every field is in range and the day exists in that month.
 */
export function isValidLocalDateTime(value: LocalDateTime): boolean {
  if (value.month < 1 || value.month > 12) return false;
  if (value.day < 1 || value.day > daysInMonth(value.year, value.month)) return false;
  if (value.hour > 23 || value.minute > 59 || value.second > 59) return false;
  return value.hour >= 0 && value.minute >= 0 && value.second >= 0;
}

function daysInMonth(year: number, month: number): number {
  // Day 0 of the following month is the last day of this one.
  return new Date(utcDayStart(year, month + 1, 0)).getUTCDate();
}

/**
 * Epoch milliseconds of UTC midnight on the given date. Unlike Date.UTC,
 * years 0-99 are taken literally rather than as 1900-1999.
 */
function utcDayStart(year: number, month: number, day: number): number {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getTime();
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/**
 * Read the local calendar fields of an instant.
 */
export function fromDate(date: Date): LocalDateTime {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
    hour: date.getHours(),
    minute: date.getMinutes(),
    second: date.getSeconds(),
  };
}

/**
 * The instant this wall-clock reading names in the process's local zone.
 * Used for display formatting only.
 */
export function toDate(value: LocalDateTime): Date {
  const date = new Date(0);
  date.setFullYear(value.year, value.month - 1, value.day);
  date.setHours(value.hour, value.minute, value.second, 0);
  return date;
}

/**
 * Render as `YYYY-MM-DDTHH:MM:SS` (the inverse of parseLocalDateTime).
 */
export function formatLocalDateTime(value: LocalDateTime): string {
  const p2 = (n: number) => String(n).padStart(2, '0');
  return (
    String(value.year).padStart(4, '0') + '-' + p2(value.month) + '-' + p2(value.day) +
    'T' + p2(value.hour) + ':' + p2(value.minute) + ':' + p2(value.second)
  );
}

// ---------------------------------------------------------------------------
// Calendar arithmetic
// ---------------------------------------------------------------------------

/**
 * Whole calendar days from `from` to `to`, ignoring the time of day.
 *
 * `2026-03-10T23:59:59` → `2026-03-11T00:00:00` is one day. Negative when
 * `to` falls on an earlier date. Computed on UTC day numbers so daylight
 * saving transitions never produce fractional days.
 */
export function calendarDaysBetween(from: LocalDateTime, to: LocalDateTime): number {
  const fromDay = utcDayStart(from.year, from.month, from.day);
  const toDay = utcDayStart(to.year, to.month, to.day);
  return Math.round((toDay - fromDay) / MS_PER_DAY);
}
