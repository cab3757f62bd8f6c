import { normalizeCourse } from '../services/coursePicker';
import { Course, RandomSource, RawCourseRecord } from '../types';

export function record(name: string, credit: number | string, dates: string, field = '', format = ''): RawCourseRecord {
  return { Name: name, Credit: credit, Field: field, Format: format, Dates: dates };
}

export function course(name: string, credit: number, dates: string, field = '', format = ''): Course {
  return normalizeCourse(record(name, credit, dates, field, format));
}

/**
 * Makes shuffle() keep the original order: j is always i
 */
export const keepOrder: RandomSource = () => 0.999999;

/**
 * Replays the given values in order, then keeps returning the last one
 */
export function scripted(values: number[]): RandomSource {
  let index = 0;
  return () => values[Math.min(index++, values.length - 1)];
}

// Pool used by the end-to-end scenarios
export const scenarioPool: RawCourseRecord[] = [
  record('CS101', 3, 'mon. 09:00-10:30', 'Systems', 'Lecture'),
  record('CS102', 3, 'wed. 09:00-10:30', 'Systems', 'Lecture'),
  record('CS103', 6, 'mon. 09:00-10:30', 'Systems', 'Lecture'),
];

export const aiCourses: RawCourseRecord[] = [
  record('CS104', 3, 'tue. 09:00-10:30', 'AI', 'Lecture'),
  record('CS105', 3, 'thur. 09:00-10:30', 'AI', 'Lecture'),
];
