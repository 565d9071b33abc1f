import { classifyBand } from './bands';
import { buildDailyFeatures } from './features';
import { roundHalfEven } from './round';
import { formatMonthDay, isMonthNumber, monthName } from './time';
import type { CalendarRow, DayFeatures, MonthlyPressureMap, Trip } from './types';

function toRow(f: DayFeatures): CalendarRow {
  const [, m, d] = f.date.split('-').map(Number);
  if (!isMonthNumber(m)) {
    throw new RangeError(`Invalid feature date: ${f.date}`);
  }
  const { band, reason } = classifyBand(f);
  return {
    fullDate: f.date,
    formattedDate: formatMonthDay(m, d),
    month: monthName(m),
    weekday: f.weekday,
    season: f.season,
    coachPressure: roundHalfEven(f.coachPressure, 2),
    tripsScheduled: f.tripCount,
    avgTripComplexity: roundHalfEven(f.avgComplexity, 2),
    band,
    reason,
  };
}

/** One classified row per day of `year`, in date order. */
export function buildCalendar(
  year: number,
  totals: MonthlyPressureMap,
  trips: readonly Trip[],
): CalendarRow[] {
  return buildDailyFeatures(year, totals, trips).map(toRow);
}
