/** One raw value as delivered by a table loader. */
export type Cell = string | number | boolean | Date | null | undefined;

/** Header-less table, row-major. */
export type Grid = Cell[][];

export interface Table {
  columns: string[];
  rows: Record<string, Cell>[];
}

export type MonthNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

/** Month number to total pressure count; absent months read as 0. */
export type MonthlyPressureMap = ReadonlyMap<MonthNumber, number>;

/** Calendar date, "YYYY-MM-DD". */
export type IsoDate = string;

export type Complexity = -1 | 0 | 1;

export interface Trip {
  bookingId: string;
  date: IsoDate;
  complexity: Complexity;
}

export type Season = 'Winter' | 'Spring' | 'Summer' | 'Fall';

export type Weekday =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

export interface DayFeatures {
  date: IsoDate;
  season: Season;
  weekday: Weekday;
  coachPressure: number; // 0..1
  tripCount: number;
  avgComplexity: number; // 0 when tripCount is 0
}

export type Band =
  | 'B (50%)'
  | 'C+ (45%)'
  | 'C (40%)'
  | 'D+ (35%)'
  | 'D (30%)'
  | 'E+ (25%)';

export interface BandResult {
  band: Band;
  reason: string;
  score: number;
}

export interface CalendarRow {
  fullDate: IsoDate;
  formattedDate: string;
  month: string;
  weekday: Weekday;
  season: Season;
  coachPressure: number;
  tripsScheduled: number;
  avgTripComplexity: number;
  band: Band;
  reason: string;
}

export interface CalendarConfig {
  year?: number;
  out?: string;
  preview?: number;
}
