import { filterByPreference } from '../preferenceFilter';
import { course } from '../../test/fixtures';

describe('filterByPreference', () => {
  const pool = [
    course('Dialog Systems', 6, 'wed. 09:00-11:30', 'Artificial Intelligence', 'Lecture'),
    course('Team Lab', 9, 'thur. 14:00-17:00', 'Computer Vision', 'Project'),
    course('Reading Group', 3, 'fri. 10:00-11:30', 'artificial intelligence; NLP', 'Seminar'),
    course('Compilers', 6, 'mon. 09:00-10:30', 'Programming Languages', 'Lecture, Exercise'),
  ];

  it('should match fields case-insensitively by substring', () => {
    expect(filterByPreference(pool, 'field', ['ARTIFICIAL'])).toEqual(new Set(['Dialog Systems', 'Reading Group']));
  });

  it('should match any of several terms', () => {
    expect(filterByPreference(pool, 'format', ['seminar', 'project'])).toEqual(new Set(['Team Lab', 'Reading Group']));
  });

  it('should find terms inside multi-valued slots', () => {
    expect(filterByPreference(pool, 'format', new Set(['exercise']))).toEqual(new Set(['Compilers']));
  });

  it('should return an empty set when no preference is given', () => {
    expect(filterByPreference(pool, 'field', [])).toEqual(new Set());
    expect(filterByPreference(pool, 'format', ['', '  '])).toEqual(new Set());
  });

  it('should return an empty set when nothing matches', () => {
    expect(filterByPreference(pool, 'field', ['Biology'])).toEqual(new Set());
  });
});
