import { describe, it, expect } from 'vitest';
import { BAND_TABLE, FALLBACK_BAND, bandForScore, classifyBand, scoreDay } from '../src/bands';
import type { Season, Weekday } from '../src/types';

const WEEKDAYS: Weekday[] = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
];
const SEASONS: Season[] = ['Winter', 'Spring', 'Summer', 'Fall'];

describe('scoreDay', () => {
  it('adds pressure, weekend, season, trips and complexity', () => {
    const result = classifyBand({
      coachPressure: 1,
      weekday: 'Friday',
      season: 'Winter',
      tripCount: 1,
      avgComplexity: 1,
    });
    expect(result).toEqual({
      band: 'C+ (45%)',
      reason: 'Very active day with high potential',
      score: 6,
    });
  });

  it('tiers pressure at 0.9, 0.7 and 0.5', () => {
    const base = {
      weekday: 'Monday' as const,
      season: 'Summer' as const,
      tripCount: 0,
      avgComplexity: 0,
    };
    expect(scoreDay({ ...base, coachPressure: 0.9 })).toBe(3);
    expect(scoreDay({ ...base, coachPressure: 0.89 })).toBe(2);
    expect(scoreDay({ ...base, coachPressure: 0.7 })).toBe(2);
    expect(scoreDay({ ...base, coachPressure: 0.5 })).toBe(1);
    expect(scoreDay({ ...base, coachPressure: 0.49 })).toBe(0);
  });

  it('tiers trips at 5 and 3', () => {
    const base = {
      coachPressure: 0,
      weekday: 'Monday' as const,
      season: 'Summer' as const,
      avgComplexity: 0,
    };
    expect(scoreDay({ ...base, tripCount: 6 })).toBe(2);
    expect(scoreDay({ ...base, tripCount: 5 })).toBe(2);
    expect(scoreDay({ ...base, tripCount: 4 })).toBe(1);
    expect(scoreDay({ ...base, tripCount: 3 })).toBe(1);
    expect(scoreDay({ ...base, tripCount: 2 })).toBe(0);
  });

  it('scores seasons and weekends', () => {
    const base = { coachPressure: 0, tripCount: 0, avgComplexity: 0 };
    expect(scoreDay({ ...base, weekday: 'Thursday', season: 'Spring' })).toBe(2);
    expect(scoreDay({ ...base, weekday: 'Saturday', season: 'Fall' })).toBe(2);
    expect(scoreDay({ ...base, weekday: 'Sunday', season: 'Summer' })).toBe(1);
  });

  it('adds average complexity without thresholding it', () => {
    const score = scoreDay({
      coachPressure: 0.95,
      weekday: 'Saturday',
      season: 'Spring',
      tripCount: 5,
      avgComplexity: 0.5,
    });
    expect(score).toBe(8.5);
  });

  it('never decreases as pressure rises', () => {
    for (const weekday of WEEKDAYS) {
      for (const season of SEASONS) {
        let last = -Infinity;
        for (let p = 0; p <= 100; p += 5) {
          const score = scoreDay({
            coachPressure: p / 100,
            weekday,
            season,
            tripCount: 3,
            avgComplexity: -0.5,
          });
          expect(score).toBeGreaterThanOrEqual(last);
          last = score;
        }
      }
    }
  });
});

describe('bandForScore', () => {
  it('picks the highest threshold the score reaches', () => {
    expect(bandForScore(9).band).toBe('B (50%)');
    expect(bandForScore(7).band).toBe('B (50%)');
    expect(bandForScore(6.5).band).toBe('C+ (45%)');
    expect(bandForScore(5).band).toBe('C (40%)');
    expect(bandForScore(4.99).band).toBe('D+ (35%)');
    expect(bandForScore(3).band).toBe('D (30%)');
    expect(bandForScore(2.99)).toEqual({
      band: 'E+ (25%)',
      reason: 'Soft demand day with low pressure and simple trips',
    });
    expect(bandForScore(-1).band).toBe('E+ (25%)');
  });

  it('assigns exactly one of the six bands to every feature record', () => {
    const bands = new Set([...BAND_TABLE.map((r) => r.band), FALLBACK_BAND.band]);
    expect(bands.size).toBe(6);
    for (const coachPressure of [0, 0.5, 0.7, 0.9, 1]) {
      for (const weekday of WEEKDAYS) {
        for (const season of SEASONS) {
          for (const tripCount of [0, 3, 5]) {
            for (const avgComplexity of [-1, -0.5, 0, 0.5, 1]) {
              const { band, score } = classifyBand({
                coachPressure,
                weekday,
                season,
                tripCount,
                avgComplexity,
              });
              expect(bands.has(band)).toBe(true);
              const expected = BAND_TABLE.find((r) => score >= r.minScore);
              expect(band).toBe(expected ? expected.band : FALLBACK_BAND.band);
            }
          }
        }
      }
    }
  });
});
