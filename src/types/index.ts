// Core domain types

export type DayToken = 'mon' | 'tue' | 'wed' | 'thur' | 'fri' | 'sat' | 'sun';

/**
 * Span on the weekly axis, in minutes since Monday 00:00
 */
export interface TimeInterval {
  start: number;
  end: number;
}

export interface ScheduleEntry {
  day: DayToken;
  startTime: string; // HH:mm format
  endTime: string; // HH:mm format
}

export interface ParsedSchedule {
  intervals: TimeInterval[];
  entries: ScheduleEntry[];
}

export interface Course {
  name: string;
  credit: number;
  field: string;
  format: string;
  intervals: readonly TimeInterval[];
  schedule: readonly ScheduleEntry[];
}

/**
 * Course record as delivered by the catalog lookup
 */
export interface RawCourseRecord {
  Name: string;
  Credit: number | string;
  Field: string;
  Format: string;
  Dates: string;
  Semester?: string;
}

export type PreferenceSlot = 'field' | 'format';

export interface Constraints {
  targetCredits: number;
  fields: ReadonlySet<string>;
  formats: ReadonlySet<string>;
}

/**
 * Returns a float in [0, 1)
 */
export type RandomSource = () => number;

export interface SolutionEntry {
  name: string;
  time: string;
  credit: number;
  intervals: TimeInterval[];
}

export type Solution = SolutionEntry[];

export interface SelectionStats {
  candidates: number;
  removedByBusySchedule: number;
  fieldMatches: number;
  formatMatches: number;
  trials: number;
  failedTrials: number;
}

export interface SelectionResult {
  solutions: Solution[];
  stats: SelectionStats;
}

export interface SelectionRequest {
  constraints: Constraints;
  busySchedule?: string | readonly string[];
}

export interface CatalogFilter {
  semester?: string;
  maxCredit?: number;
}
