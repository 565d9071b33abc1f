import { coachPressure, maxMonthlyTotal } from './pressure';
import { daysOfYear } from './time';
import type { DayFeatures, IsoDate, MonthNumber, MonthlyPressureMap, Season, Trip } from './types';

export function seasonForMonth(month: MonthNumber): Season {
  switch (month) {
    case 12:
    case 1:
    case 2:
      return 'Winter';
    case 3:
    case 4:
    case 5:
      return 'Spring';
    case 6:
    case 7:
    case 8:
      return 'Summer';
    default:
      return 'Fall';
  }
}

export function groupTripsByDate(trips: readonly Trip[]): Map<IsoDate, Trip[]> {
  const byDate = new Map<IsoDate, Trip[]>();
  for (const trip of trips) {
    const list = byDate.get(trip.date);
    if (list) list.push(trip);
    else byDate.set(trip.date, [trip]);
  }
  return byDate;
}

function meanComplexity(trips: readonly Trip[]): number {
  if (trips.length === 0) return 0;
  let sum = 0;
  for (const t of trips) sum += t.complexity;
  return sum / trips.length;
}

/**
 * Feature record for each day of `year`, January 1 through December 31.
 * Throws DivisionError up front when the totals give no pressure scale.
 */
export function buildDailyFeatures(
  year: number,
  totals: MonthlyPressureMap,
  trips: readonly Trip[],
): DayFeatures[] {
  const max = maxMonthlyTotal(totals);
  const byDate = groupTripsByDate(trips);

  return daysOfYear(year).map((day) => {
    const today = byDate.get(day.date) ?? [];
    return {
      date: day.date,
      season: seasonForMonth(day.month),
      weekday: day.weekday,
      coachPressure: coachPressure(totals, day.month, max),
      tripCount: today.length,
      avgComplexity: meanComplexity(today),
    };
  });
}
