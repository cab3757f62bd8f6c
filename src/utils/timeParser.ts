import { DayToken, ParsedSchedule, ScheduleEntry, TimeInterval } from '../types';
import { FormatError } from './errors';

export const MINUTES_PER_DAY = 24 * 60;

export const DAY_ORDER: readonly DayToken[] = ['mon', 'tue', 'wed', 'thur', 'fri', 'sat', 'sun'];

const dayAliases: Record<string, DayToken> = {
  mon: 'mon',
  monday: 'mon',
  tue: 'tue',
  tues: 'tue',
  tuesday: 'tue',
  wed: 'wed',
  wednesday: 'wed',
  thu: 'thur',
  thur: 'thur',
  thurs: 'thur',
  thursday: 'thur',
  fri: 'fri',
  friday: 'fri',
  sat: 'sat',
  saturday: 'sat',
  sun: 'sun',
  sunday: 'sun',
};

/**
 * Parse a day token ("mon", "Thur", "friday") to its canonical form
 */
export function parseDay(dayStr: string): DayToken | null {
  return dayAliases[dayStr.trim().toLowerCase()] ?? null;
}

/**
 * Offset of the day's midnight on the weekly axis, in minutes
 */
export function dayOffset(day: DayToken): number {
  return DAY_ORDER.indexOf(day) * MINUTES_PER_DAY;
}

/**
 * Convert "hh:mm" to minutes since midnight.
 * Returns null for anything that is not a valid clock value; "24:00" is only valid as an end time.
 */
export function clockToMinutes(clock: string, allowEndOfDay = false): number | null {
  const match = clock.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) return null;

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);

  if (minutes > 59) return null;
  if (hours === 24 && minutes === 0 && allowEndOfDay) return MINUTES_PER_DAY;
  if (hours > 23) return null;

  return hours * 60 + minutes;
}

/**
 * Convert minutes since midnight to "HH:mm"
 */
export function minutesToClock(minutes: number): string {
  const hours = Math.floor(minutes / 60);
  const mins = minutes % 60;
  return `${hours.toString().padStart(2, '0')}:${mins.toString().padStart(2, '0')}`;
}

/**
 * Parse a weekly time description into intervals on the minutes-since-Monday axis.
 *
 * Examples:
 * - "mon. 09:00-10:30"
 * - "Tue. 9:00-11:00; thur. 14:00-15:30"
 *
 * Any malformed entry throws a FormatError; there is no partial result.
 * An empty or blank string yields an empty schedule.
 */
export function parseDates(dates: string): ParsedSchedule {
  const intervals: TimeInterval[] = [];
  const entries: ScheduleEntry[] = [];

  const parts = dates.split(';').map(p => p.trim()).filter(p => p);

  for (const part of parts) {
    const separator = part.indexOf('.');
    if (separator < 0) {
      throw new FormatError(`Missing day separator "." in "${part}"`, { entry: part, source: dates });
    }

    const dayStr = part.substring(0, separator);
    const duration = part.substring(separator + 1).trim();

    const day = parseDay(dayStr);
    if (!day) {
      throw new FormatError(`Unknown day "${dayStr.trim()}" in "${part}"`, { entry: part, source: dates });
    }

    const bounds = duration.split('-');
    if (bounds.length !== 2) {
      throw new FormatError(`Expected "hh:mm-hh:mm" after the day in "${part}"`, { entry: part, source: dates });
    }

    const start = clockToMinutes(bounds[0]);
    const end = clockToMinutes(bounds[1], true);
    if (start === null || end === null) {
      throw new FormatError(`Unparsable clock value in "${part}"`, { entry: part, source: dates });
    }
    if (end <= start) {
      throw new FormatError(`End time must be after start time in "${part}"`, { entry: part, source: dates });
    }

    const offset = dayOffset(day);
    intervals.push({ start: offset + start, end: offset + end });
    entries.push({ day, startTime: minutesToClock(start), endTime: minutesToClock(end) });
  }

  return { intervals, entries };
}

/**
 * Parse a busy schedule given as one string or a list of strings
 */
export function parseBusySchedule(schedule: string | readonly string[] | undefined): TimeInterval[] {
  if (schedule === undefined) return [];
  const joined = typeof schedule === 'string' ? schedule : schedule.join(';');
  return parseDates(joined).intervals;
}

/**
 * Check if any interval of one set overlaps any interval of the other by more than zero minutes
 */
export function intervalsOverlap(a: readonly TimeInterval[], b: readonly TimeInterval[]): boolean {
  for (const x of a) {
    for (const y of b) {
      if (Math.min(x.end, y.end) - Math.max(x.start, y.start) > 0) {
        return true;
      }
    }
  }
  return false;
}

/**
 * Render schedule entries back to the input notation: "mon. 09:00-10:30; wed. 09:00-10:30"
 */
export function formatSchedule(entries: readonly ScheduleEntry[]): string {
  return entries.map(e => `${e.day}. ${e.startTime}-${e.endTime}`).join('; ');
}
