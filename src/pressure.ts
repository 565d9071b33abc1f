import { DivisionError, MalformedInputError } from './errors';
import { MONTH_NAMES, isMonthNumber } from './time';
import type { Cell, Grid, MonthNumber, MonthlyPressureMap } from './types';

/**
 * Zero-based index of the header row in a capacity summary. The rows above it
 * are report metadata from the spreadsheet template and are discarded
 * unread; headers are never inferred.
 */
export const SUMMARY_HEADER_ROW = 4;

const DIGITS = /\d+/;

function cellText(cell: Cell): string {
  if (cell == null) return '';
  if (cell instanceof Date) return cell.toISOString();
  return String(cell);
}

/** First run of decimal digits in the cell, or undefined when it has none. */
export function extractCount(cell: Cell): number | undefined {
  const match = cellText(cell).match(DIGITS);
  if (!match) return undefined;
  const value = Number(match[0]);
  if (!Number.isSafeInteger(value)) {
    throw new MalformedInputError(
      `Capacity summary value "${match[0]}" is not a usable integer`,
    );
  }
  return value;
}

/**
 * Sum each month column of a capacity summary. Months without a header
 * column are left out of the result.
 */
export function extractMonthlyTotals(grid: Grid): MonthlyPressureMap {
  if (grid.length < SUMMARY_HEADER_ROW + 1) {
    throw new MalformedInputError(
      `Capacity summary needs at least ${SUMMARY_HEADER_ROW + 1} rows (found ${grid.length})`,
    );
  }
  const header = grid[SUMMARY_HEADER_ROW].map((c) => cellText(c).trim());
  const body = grid.slice(SUMMARY_HEADER_ROW + 1);

  const totals = new Map<MonthNumber, number>();
  MONTH_NAMES.forEach((name, idx) => {
    const month = idx + 1;
    const col = header.indexOf(name);
    if (col === -1 || !isMonthNumber(month)) return;
    let sum = 0;
    for (const row of body) {
      const count = extractCount(row[col]);
      if (count !== undefined) sum += count;
    }
    if (!Number.isSafeInteger(sum)) {
      throw new MalformedInputError(`Capacity summary total for ${name} overflows`);
    }
    totals.set(month, sum);
  });
  return totals;
}

/** Largest monthly total; pressure is undefined without a positive one. */
export function maxMonthlyTotal(totals: MonthlyPressureMap): number {
  if (totals.size === 0) {
    throw new DivisionError(
      'Capacity summary has no month columns; coach pressure cannot be computed',
    );
  }
  const max = Math.max(...totals.values());
  if (!(max > 0)) {
    throw new DivisionError(
      'Every monthly total is zero; coach pressure cannot be computed',
    );
  }
  return max;
}

export function coachPressure(
  totals: MonthlyPressureMap,
  month: MonthNumber,
  max = maxMonthlyTotal(totals),
): number {
  return (totals.get(month) ?? 0) / max;
}
