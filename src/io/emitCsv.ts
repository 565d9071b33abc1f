import { formatDecimal } from '../round';
import type { CalendarRow } from '../types';

export const CALENDAR_HEADER = [
  'Full Date',
  'Formatted Date',
  'Month',
  'Weekday',
  'Season',
  'Coach Pressure',
  'Trips Scheduled',
  'Avg Trip Complexity',
  'Suggested Band',
  'Reason',
] as const;

function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function rowToCsv(row: CalendarRow): string {
  const cols = [
    row.fullDate,
    row.formattedDate,
    row.month,
    row.weekday,
    row.season,
    formatDecimal(row.coachPressure),
    String(row.tripsScheduled),
    formatDecimal(row.avgTripComplexity),
    row.band,
    row.reason,
  ];
  return cols.map(escapeCsv).join(',');
}

/** Serialize calendar rows to CSV, header first, newline-terminated. */
export function emitCsv(rows: readonly CalendarRow[]): string {
  const lines = [CALENDAR_HEADER.join(',')];
  for (const row of rows) {
    lines.push(rowToCsv(row));
  }
  return `${lines.join('\n')}\n`;
}

export default emitCsv;
