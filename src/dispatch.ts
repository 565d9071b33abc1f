import { DateTime } from 'luxon';
import { SchemaError } from './errors';
import { isoDate } from './time';
import type { Cell, Complexity, IsoDate, Table, Trip } from './types';

export const DISPATCH_COLUMNS = {
  bookingId: 'Booking ID',
  departure: 'First Departure',
  route: 'Route Description',
  destination: 'Destination',
  groupName: 'Group Name',
} as const;

export const URBAN_KEYWORDS = ['nyc', 'manhattan', 'dc', 'downtown'] as const;
export const LEISURE_KEYWORDS = ['hershey', 'dorney', 'park', 'amusement'] as const;

const DATE_FORMATS = ['M/d/yyyy', 'M/d/yy', 'MMM d, yyyy', 'MMMM d, yyyy'];
const TIME_SUFFIXES = ['', ' H:mm', ' H:mm:ss', ' h:mm a', ' h:mm:ss a'];

// Tried in order after ISO, SQL and RFC 2822.
const DEPARTURE_FORMATS = DATE_FORMATS.flatMap((date) =>
  TIME_SUFFIXES.map((time) => date + time),
);

// Cell texts the dispatch export uses for an absent value.
const MISSING_MARKERS = new Set([
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

export interface DispatchResult {
  trips: Trip[];
  droppedMissingBookingId: number;
  droppedInvalidDeparture: number;
}

function text(cell: Cell): string {
  if (cell == null) return '';
  if (cell instanceof Date) return cell.toISOString();
  return String(cell);
}

/**
 * Calendar date of a departure timestamp, as written: the time of day and
 * any UTC offset are dropped without converting zones. Returns undefined
 * for anything that is not a recognisable date.
 */
export function parseDeparture(cell: Cell): IsoDate | undefined {
  if (cell instanceof Date) {
    // Spreadsheet dates carry their wall-clock time in the UTC fields.
    if (Number.isNaN(cell.getTime())) return undefined;
    return isoDate(cell.getUTCFullYear(), cell.getUTCMonth() + 1, cell.getUTCDate());
  }
  if (typeof cell !== 'string') return undefined;
  const str = cell.trim();
  if (!str) return undefined;

  const candidates = [
    DateTime.fromISO(str, { setZone: true }),
    DateTime.fromSQL(str, { setZone: true }),
    DateTime.fromRFC2822(str, { setZone: true }),
    ...DEPARTURE_FORMATS.map((fmt) =>
      DateTime.fromFormat(str, fmt, { zone: 'utc', locale: 'en-US' }),
    ),
  ];
  const parsed = candidates.find((dt) => dt.isValid);
  if (!parsed) return undefined;
  return isoDate(parsed.year, parsed.month, parsed.day);
}

/**
 * Urban trips score 1, leisure trips -1, anything else 0. Matching is plain
 * substring search on the lowercased text, and urban wins when both match.
 */
export function inferComplexity(
  route: string,
  destination: string,
  groupName: string,
): Complexity {
  const blob = [route, destination, groupName].join(' ').toLowerCase();
  if (URBAN_KEYWORDS.some((k) => blob.includes(k))) return 1;
  if (LEISURE_KEYWORDS.some((k) => blob.includes(k))) return -1;
  return 0;
}

export function assertDispatchSchema(table: Table): void {
  const present = new Set(table.columns);
  const missing = Object.values(DISPATCH_COLUMNS).filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }
}

/**
 * Filter a dispatch report down to bookable trips with a departure date.
 * Rows without a booking id (blank, or a marker such as "N/A") or with an unparseable departure are counted
 * and skipped, never reported as errors.
 */
export function normalizeDispatch(table: Table): DispatchResult {
  assertDispatchSchema(table);

  const result: DispatchResult = {
    trips: [],
    droppedMissingBookingId: 0,
    droppedInvalidDeparture: 0,
  };
  for (const row of table.rows) {
    const bookingId = text(row[DISPATCH_COLUMNS.bookingId]).trim();
    if (!bookingId || MISSING_MARKERS.has(bookingId)) {
      result.droppedMissingBookingId++;
      continue;
    }
    const date = parseDeparture(row[DISPATCH_COLUMNS.departure]);
    if (!date) {
      result.droppedInvalidDeparture++;
      continue;
    }
    result.trips.push({
      bookingId,
      date,
      complexity: inferComplexity(
        text(row[DISPATCH_COLUMNS.route]),
        text(row[DISPATCH_COLUMNS.destination]),
        text(row[DISPATCH_COLUMNS.groupName]),
      ),
    });
  }
  return result;
}
