import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import ExcelJS from 'exceljs';
import type { Cell as SheetCell } from 'exceljs';
import Papa from 'papaparse';
import { InputError } from '../errors';
import type { Cell, Grid } from '../types';

/** Parse comma-separated text into a header-less grid. Blank lines are skipped. */
export function parseCsvGrid(csv: string): Grid {
  const { data } = Papa.parse<string[]>(csv.replace(/^\uFEFF/, ''), {
    header: false,
    delimiter: ',',
    skipEmptyLines: true,
  });
  return data.map((row) => row.map((v): Cell => (v === '' ? null : v)));
}

function toCell(cell: SheetCell): Cell {
  const v = cell.value;
  if (v == null) return null;
  if (
    typeof v === 'string' ||
    typeof v === 'number' ||
    typeof v === 'boolean' ||
    v instanceof Date
  ) {
    return v;
  }
  // Rich text, hyperlinks, formulas: use what the sheet displays.
  return cell.text || null;
}

/** First worksheet of an .xlsx workbook as a header-less grid. */
export async function readXlsxGrid(path: string): Promise<Grid> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);
  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new InputError(`Workbook has no worksheets: ${path}`);
  }
  const grid: Grid = [];
  // Blank rows are kept so that positional layouts stay aligned.
  for (let r = 1; r <= sheet.rowCount; r++) {
    const row = sheet.getRow(r);
    const cells: Cell[] = [];
    for (let c = 1; c <= sheet.columnCount; c++) {
      cells.push(toCell(row.getCell(c)));
    }
    grid.push(cells);
  }
  return grid;
}

/** Load a .csv or .xlsx file, chosen by extension. */
export async function loadGrid(path: string): Promise<Grid> {
  const ext = extname(path).toLowerCase();
  if (ext === '.csv') {
    return parseCsvGrid(readFileSync(path, 'utf8'));
  }
  if (ext === '.xlsx') {
    return readXlsxGrid(path);
  }
  throw new InputError(`Unsupported file type "${ext || path}": expected .csv or .xlsx`);
}
