import { DateTime } from 'luxon';
import type { IsoDate, MonthNumber, Weekday } from './types';

export const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

// Indexed by ISO weekday - 1 (Monday = 1).
const WEEKDAYS: readonly Weekday[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function isoDate(year: number, month: number, day: number): IsoDate {
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

export function monthName(month: MonthNumber): string {
  return MONTH_NAMES[month - 1];
}

/**
 * "March 4": month name and unpadded day of month, formatted separately so
 * the result does not depend on platform strftime flags.
 */
export function formatMonthDay(month: MonthNumber, day: number): string {
  return `${monthName(month)} ${day}`;
}

export interface CalendarDay {
  date: IsoDate;
  month: MonthNumber;
  day: number;
  weekday: Weekday;
}

export function isMonthNumber(n: number): n is MonthNumber {
  return Number.isInteger(n) && n >= 1 && n <= 12;
}

function toMonthNumber(n: number): MonthNumber {
  if (!isMonthNumber(n)) {
    throw new RangeError(`Invalid month: ${n}`);
  }
  return n;
}

/** Every day of `year` from January 1 to December 31, in order. */
export function daysOfYear(year: number): CalendarDay[] {
  const first = DateTime.utc(year, 1, 1);
  if (!first.isValid) {
    throw new RangeError(`Invalid year: ${year}`);
  }
  const days: CalendarDay[] = [];
  for (let i = 0; i < first.daysInYear; i++) {
    const dt = first.plus({ days: i });
    days.push({
      date: isoDate(dt.year, dt.month, dt.day),
      month: toMonthNumber(dt.month),
      day: dt.day,
      weekday: WEEKDAYS[dt.weekday - 1],
    });
  }
  return days;
}

export function formatTimestampToken(ts: string): string {
  const d = new Date(ts);
  return `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(
    d.getUTCDate(),
  )}T${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}`;
}
