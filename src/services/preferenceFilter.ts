import { Course, PreferenceSlot } from '../types';

/**
 * Names of courses whose field or format contains any of the preferred terms (case-insensitive).
 * No terms means no preference signal, so the result is empty rather than "everything".
 */
export function filterByPreference(
  courses: readonly Course[],
  slot: PreferenceSlot,
  terms: Iterable<string>
): Set<string> {
  const needles = [...terms].map(t => t.trim().toLowerCase()).filter(t => t);
  if (needles.length === 0) {
    return new Set();
  }

  const matches = new Set<string>();
  for (const course of courses) {
    const value = course[slot].toLowerCase();
    if (needles.some(needle => value.includes(needle))) {
      matches.add(course.name);
    }
  }
  return matches;
}
