import { InputError } from '../errors';
import type { CalendarConfig, Cell, Grid, Table } from '../types';

export const MIN_YEAR = 2020;
export const MAX_YEAR = 2100;

type PlainObj = Record<string, unknown>;

function isPlainObj(v: unknown): v is PlainObj {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Use the first grid row as column names. Names are trimmed; a column with
 * a blank name gets its 1-based position instead.
 */
export function gridToTable(grid: Grid): Table {
  if (grid.length === 0) return { columns: [], rows: [] };
  const columns = grid[0].map((c, idx) => {
    const name = c == null ? '' : String(c).trim();
    return name || `Column ${idx + 1}`;
  });
  const rows = grid.slice(1).map((cells) => {
    const row: Record<string, Cell> = {};
    columns.forEach((col, idx) => {
      // Duplicate headers keep the first column's value.
      if (!(col in row)) row[col] = cells[idx] ?? null;
    });
    return row;
  });
  return { columns, rows };
}

export function validateYear(year: number): number {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new InputError(
      `Year must be a whole number between ${MIN_YEAR} and ${MAX_YEAR} (got ${year})`,
    );
  }
  return year;
}

function readNumber(obj: PlainObj, key: string): number | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    throw new InputError(`Config "${key}" must be a number`);
  }
  return n;
}

/** Validate a calendar config object; unknown keys are ignored. */
export function parseCalendarConfig(json: unknown): CalendarConfig {
  if (!isPlainObj(json)) {
    throw new InputError('Config must be a JSON object');
  }
  const cfg: CalendarConfig = {};
  const year = readNumber(json, 'year');
  if (year !== undefined) cfg.year = validateYear(year);
  const preview = readNumber(json, 'preview');
  if (preview !== undefined) {
    if (!Number.isInteger(preview) || preview < 0) {
      throw new InputError('Config "preview" must be a non-negative integer');
    }
    cfg.preview = preview;
  }
  if (json.out !== undefined) {
    if (typeof json.out !== 'string' || !json.out.trim()) {
      throw new InputError('Config "out" must be a file path');
    }
    cfg.out = json.out;
  }
  return cfg;
}
