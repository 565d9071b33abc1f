import type { Band, BandResult, DayFeatures, Season, Weekday } from './types';

// Business heuristics; the cutoffs are fixed, not fitted.
export const PRESSURE_POINTS: ReadonlyArray<readonly [min: number, points: number]> = [
  [0.9, 3],
  [0.7, 2],
  [0.5, 1],
];

export const SEASON_POINTS: Readonly<Record<Season, number>> = {
  Winter: 1,
  Spring: 2,
  Summer: 0,
  Fall: 1,
};

export const TRIP_POINTS: ReadonlyArray<readonly [min: number, points: number]> = [
  [5, 2],
  [3, 1],
];

export const WEEKEND_DAYS: ReadonlySet<Weekday> = new Set<Weekday>([
  'Friday',
  'Saturday',
  'Sunday',
]);

export interface BandRule {
  minScore: number;
  band: Band;
  reason: string;
}

/** Descending by score; the first rule a score reaches wins. */
export const BAND_TABLE: readonly BandRule[] = [
  { minScore: 7, band: 'B (50%)', reason: 'High volume, peak season, complex trips' },
  { minScore: 6, band: 'C+ (45%)', reason: 'Very active day with high potential' },
  { minScore: 5, band: 'C (40%)', reason: 'Healthy demand with multiple trip drivers' },
  { minScore: 4, band: 'D+ (35%)', reason: 'Mid-level day with moderate complexity' },
  { minScore: 3, band: 'D (30%)', reason: 'Low trip count but seasonal factors' },
];

export const FALLBACK_BAND: Omit<BandRule, 'minScore'> = {
  band: 'E+ (25%)',
  reason: 'Soft demand day with low pressure and simple trips',
};

function tierPoints(
  value: number,
  tiers: ReadonlyArray<readonly [min: number, points: number]>,
): number {
  for (const [min, points] of tiers) {
    if (value >= min) return points;
  }
  return 0;
}

type ScoreInput = Pick<
  DayFeatures,
  'coachPressure' | 'weekday' | 'season' | 'tripCount' | 'avgComplexity'
>;

export function scoreDay(f: ScoreInput): number {
  let score = 0;
  score += tierPoints(f.coachPressure, PRESSURE_POINTS);
  if (WEEKEND_DAYS.has(f.weekday)) score += 1;
  score += SEASON_POINTS[f.season];
  score += tierPoints(f.tripCount, TRIP_POINTS);
  score += f.avgComplexity;
  return score;
}

export function bandForScore(score: number): Omit<BandRule, 'minScore'> {
  const rule = BAND_TABLE.find((r) => score >= r.minScore);
  return rule ? { band: rule.band, reason: rule.reason } : FALLBACK_BAND;
}

/** Pricing band for a day. Total: every feature record gets exactly one band. */
export function classifyBand(f: ScoreInput): BandResult {
  const score = scoreDay(f);
  return { ...bandForScore(score), score };
}
