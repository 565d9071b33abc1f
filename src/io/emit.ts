import { BAND_TABLE, FALLBACK_BAND } from '../bands';
import { formatDecimal } from '../round';
import { MONTH_NAMES } from '../time';
import type { Band, CalendarRow } from '../types';

export interface EmitOptions {
  /** include Markdown summary */
  markdown?: boolean;
}

export interface EmitResult {
  json: string;
  runTimestamp: string;
  markdown?: string;
}

export const BANDS: readonly Band[] = [
  ...BAND_TABLE.map((r) => r.band),
  FALLBACK_BAND.band,
];

export type BandCounts = Record<Band, number>;

export function countBands(rows: readonly CalendarRow[]): BandCounts {
  const counts: BandCounts = {
    'B (50%)': 0,
    'C+ (45%)': 0,
    'C (40%)': 0,
    'D+ (35%)': 0,
    'D (30%)': 0,
    'E+ (25%)': 0,
  };
  for (const row of rows) counts[row.band]++;
  return counts;
}

function toMarkdown(year: number, rows: readonly CalendarRow[]): string {
  const lines: string[] = [
    `# Pricing Calendar ${year}`,
    '',
    `| Month | ${BANDS.join(' | ')} | Avg Pressure | Trips |`,
    `| ----- |${BANDS.map(() => ' ---:|').join('')} ---:| ---:|`,
  ];
  for (const month of MONTH_NAMES) {
    const monthRows = rows.filter((r) => r.month === month);
    if (monthRows.length === 0) continue;
    const counts = countBands(monthRows);
    const pressure =
      monthRows.reduce((sum, r) => sum + r.coachPressure, 0) / monthRows.length;
    const trips = monthRows.reduce((sum, r) => sum + r.tripsScheduled, 0);
    lines.push(
      `| ${month} | ${BANDS.map((b) => counts[b]).join(' | ')} | ${pressure.toFixed(
        2,
      )} | ${trips} |`,
    );
  }
  const totals = countBands(rows);
  lines.push(
    `| **Total** | ${BANDS.map((b) => totals[b]).join(' | ')} | | ${rows.reduce(
      (sum, r) => sum + r.tripsScheduled,
      0,
    )} |`,
  );
  lines.push('');
  return lines.join('\n');
}

/** Serialize the calendar to JSON and an optional Markdown summary. */
export function emitCalendar(
  year: number,
  rows: readonly CalendarRow[],
  runTimestamp = new Date().toISOString(),
  opts: EmitOptions = {},
): EmitResult {
  const json = JSON.stringify({ runTimestamp, year, days: rows }, null, 2);
  const result: EmitResult = { json, runTimestamp };
  if (opts.markdown) {
    result.markdown = toMarkdown(year, rows);
  }
  return result;
}

/** Fixed-width text table of the first `limit` rows, for the console. */
export function formatPreview(rows: readonly CalendarRow[], limit: number): string {
  const head = rows.slice(0, limit);
  const header = ['Date', 'Weekday', 'Season', 'Pressure', 'Trips', 'Complexity', 'Band'];
  const body = head.map((r) => [
    r.formattedDate,
    r.weekday,
    r.season,
    formatDecimal(r.coachPressure),
    String(r.tripsScheduled),
    formatDecimal(r.avgTripComplexity),
    r.band,
  ]);
  const widths = header.map((h, i) =>
    Math.max(h.length, ...body.map((cols) => cols[i].length)),
  );
  const fmt = (cols: string[]) =>
    cols.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [fmt(header), ...body.map(fmt)].join('\n');
}
