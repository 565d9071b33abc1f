import { buildCalendar } from '../calendar';
import { normalizeDispatch, type DispatchResult } from '../dispatch';
import { countBands } from '../io/emit';
import { loadGrid } from '../io/loadTable';
import { gridToTable, validateYear } from '../io/parse';
import { extractMonthlyTotals } from '../pressure';
import { monthName } from '../time';
import type { CalendarRow, Grid, MonthlyPressureMap } from '../types';

export interface GenerateCalendarOptions {
  summaryPath: string;
  dispatchPath: string;
  year: number;
  verbose?: boolean;
}

export interface PipelineResult {
  year: number;
  rows: CalendarRow[];
  totals: MonthlyPressureMap;
  dispatch: Omit<DispatchResult, 'trips'> & { trips: number };
}

function formatTotals(totals: MonthlyPressureMap): string {
  const parts = [...totals.entries()]
    .sort(([a], [b]) => a - b)
    .map(([month, total]) => `${monthName(month).slice(0, 3)}=${total}`);
  return parts.length ? parts.join(' ') : 'none';
}

function logRun(result: PipelineResult, verbose: boolean): void {
  const { dispatch } = result;
  const dropped = dispatch.droppedMissingBookingId + dispatch.droppedInvalidDeparture;
  if (verbose) {
    console.log(`monthly totals: ${formatTotals(result.totals)}`);
    console.log(
      `dispatch: kept=${dispatch.trips} missingBookingId=${dispatch.droppedMissingBookingId} invalidDeparture=${dispatch.droppedInvalidDeparture}`,
    );
  } else if (dropped > 0) {
    console.warn(
      `Skipped ${dropped} dispatch row(s) without a booking id or a parseable departure`,
    );
  }
  const counts = countBands(result.rows);
  const bands = Object.entries(counts)
    .map(([band, n]) => `${band.split(' ')[0]}=${n}`)
    .join(' ');
  console.log(
    [
      `Year ${result.year}`,
      `days=${result.rows.length}`,
      `trips=${dispatch.trips}`,
      `dropped=${dropped}`,
      `bands: ${bands}`,
    ].join(' | '),
  );
}

/** Run the pipeline on already-loaded grids. Does no I/O and no logging. */
export function generateFromGrids(
  summary: Grid,
  dispatchGrid: Grid,
  year: number,
): PipelineResult {
  validateYear(year);
  const totals = extractMonthlyTotals(summary);
  const dispatch = normalizeDispatch(gridToTable(dispatchGrid));
  const rows = buildCalendar(year, totals, dispatch.trips);
  return {
    year,
    rows,
    totals,
    dispatch: {
      trips: dispatch.trips.length,
      droppedMissingBookingId: dispatch.droppedMissingBookingId,
      droppedInvalidDeparture: dispatch.droppedInvalidDeparture,
    },
  };
}

export async function generateCalendar(
  opts: GenerateCalendarOptions,
): Promise<PipelineResult> {
  validateYear(opts.year);
  const [summary, dispatch] = await Promise.all([
    loadGrid(opts.summaryPath),
    loadGrid(opts.dispatchPath),
  ]);
  const result = generateFromGrids(summary, dispatch, opts.year);
  logRun(result, Boolean(opts.verbose));
  return result;
}
