import dayjs from 'dayjs';
import customParseFormat from 'dayjs/plugin/customParseFormat';

dayjs.extend(customParseFormat);

/**
 * A `YYYY-MM` token used to bucket records by calendar month
 */
export type MonthKey = string;

const DATE_FORMAT = 'YYYY-MM-DD';
const MONTH_FORMAT = 'YYYY-MM';

const ISO_DATE_TIME =
  /^(\d{4})-?(\d{2})-?(\d{2})(?:[T ]\d{2}(?::?\d{2}(?::?\d{2}(?:[.,]\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?)?$/;
const INTEGER_SEGMENT = /^\s*\+?\d+\s*$/;

export function formatDate(date: Date): string {
  return dayjs(date).format(DATE_FORMAT);
}

export function todayDateString(now: Date = new Date()): string {
  return formatDate(now);
}

export function currentMonthKey(now: Date = new Date()): MonthKey {
  return dayjs(now).format(MONTH_FORMAT);
}

export function formatMonthKey(year: number, month: number): MonthKey {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/**
 * Checks for a real calendar date written as `YYYY-MM-DD`
 */
export function isDateString(value: string): boolean {
  return dayjs(value, DATE_FORMAT, true).isValid();
}

export function isMonthKey(value: string): boolean {
  return dayjs(value, MONTH_FORMAT, true).isValid();
}

function fromStrictDate(value: string): MonthKey | null {
  const parsed = dayjs(value, DATE_FORMAT, true);
  return parsed.isValid() ? parsed.format(MONTH_FORMAT) : null;
}

// Year and month are taken as written; an offset never moves the month
function fromIsoDateTime(value: string): MonthKey | null {
  const match = ISO_DATE_TIME.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  if (!isDateString(`${year}-${month}-${day}`)) {
    return null;
  }
  return `${year}-${month}`;
}

function fromSegments(value: string): MonthKey | null {
  const segments = value.split('-').filter((segment) => segment.trim() !== '');
  if (segments.length < 2 || !segments.every((segment) => INTEGER_SEGMENT.test(segment))) {
    return null;
  }
  return formatMonthKey(parseInt(segments[0].trim(), 10), parseInt(segments[1].trim(), 10));
}

/**
 * Derives the `YYYY-MM` key of a loosely formatted date.
 *
 * Tries, in order, a strict `YYYY-MM-DD` date, an ISO-8601 date or date-time,
 * and finally the first two integer segments of a `-` separated string.
 *
 * @returns The month key, or null when no stage can read the value
 *
 * @example
 * ```typescript
 * monthKey('2024-03-15'); // '2024-03'
 * monthKey('2024-03'); // '2024-03'
 * monthKey('not-a-date'); // null
 * ```
 */
export function monthKey(date: string): MonthKey | null {
  return fromStrictDate(date) ?? fromIsoDateTime(date) ?? fromSegments(date);
}
