import {
  AirtableCourseCatalog,
  applyFilter,
  CatalogRecord,
  InMemoryCourseCatalog,
  normalizeRecord,
} from '../catalog';
import { CatalogUnavailableError } from '../../utils/errors';
import { RawCourseRecord } from '../../types';

const fall: RawCourseRecord = { Name: 'CS101', Credit: 3, Field: 'Systems', Format: 'Lecture', Dates: 'mon. 09:00-10:30', Semester: 'Fall' };
const spring: RawCourseRecord = { Name: 'CS201', Credit: '6', Field: 'AI', Format: 'Seminar', Dates: 'tue. 09:00-12:00', Semester: 'Spring' };

function row(id: string, fields: Record<string, unknown>): CatalogRecord {
  return { id, fields };
}

describe('catalog', () => {
  describe('applyFilter', () => {
    it('should match semesters case-insensitively', () => {
      expect(applyFilter([fall, spring], { semester: ' spring ' })).toEqual([spring]);
    });

    it('should drop courses above the credit cap', () => {
      expect(applyFilter([fall, spring], { maxCredit: 5 })).toEqual([fall]);
    });

    it('should return everything without a filter', () => {
      expect(applyFilter([fall, spring])).toEqual([fall, spring]);
    });
  });

  describe('InMemoryCourseCatalog', () => {
    it('should list filtered courses', async () => {
      const catalog = new InMemoryCourseCatalog([fall, spring]);
      await expect(catalog.listCourses({ semester: 'fall', maxCredit: 6 })).resolves.toEqual([fall]);
    });
  });

  describe('normalizeRecord', () => {
    it('should map column aliases and join list values', () => {
      const result = normalizeRecord(row('rec1', {
        Course: ' Dialog Systems ',
        credits: 6,
        Schedule: ['mon. 09:00-10:30', 'wed. 09:00-10:30'],
        Fields: ['AI', 'Linguistics'],
        Format: 'Seminar',
        Sms: 'Fall',
      }));

      expect(result).toEqual({
        Name: 'Dialog Systems',
        Credit: 6,
        Field: 'AI, Linguistics',
        Format: 'Seminar',
        Dates: 'mon. 09:00-10:30; wed. 09:00-10:30',
        Semester: 'Fall',
      });
    });

    it('should default missing field and format to empty strings', () => {
      const result = normalizeRecord(row('rec2', { Name: 'CS101', Credit: '3', Dates: 'mon. 09:00-10:30' }));
      expect(result?.Field).toBe('');
      expect(result?.Format).toBe('');
      expect(result?.Credit).toBe('3');
    });

    it('should skip rows without a name, credit or dates', () => {
      expect(normalizeRecord(row('rec3', { Credit: 3, Dates: 'mon. 09:00-10:30' }))).toBeNull();
      expect(normalizeRecord(row('rec4', { Name: 'CS101', Dates: 'mon. 09:00-10:30' }))).toBeNull();
      expect(normalizeRecord(row('rec5', { Name: 'CS101', Credit: 3, Dates: '  ' }))).toBeNull();
    });
  });

  describe('AirtableCourseCatalog', () => {
    const rows = [
      row('rec1', { Name: 'CS101', Credit: 3, Dates: 'mon. 09:00-10:30', Semester: 'Fall' }),
      row('rec2', { Name: 'CS201', Credit: 6, Dates: 'tue. 09:00-12:00', Semester: 'Spring' }),
      row('rec3', { Credit: 3 }),
    ];

    it('should share one fetch between concurrent callers', async () => {
      const source = jest.fn().mockResolvedValue(rows);
      const catalog = new AirtableCourseCatalog({ cacheTtlMs: 1000, source });

      const [a, b] = await Promise.all([catalog.listCourses(), catalog.listCourses({ semester: 'Fall' })]);

      expect(source).toHaveBeenCalledTimes(1);
      expect(a.map(c => c.Name)).toEqual(['CS101', 'CS201']);
      expect(b.map(c => c.Name)).toEqual(['CS101']);
    });

    it('should serve from cache until the TTL expires', async () => {
      let clock = 0;
      const source = jest.fn().mockResolvedValue(rows);
      const catalog = new AirtableCourseCatalog({ cacheTtlMs: 1000, source, now: () => clock });

      await catalog.listCourses();
      clock = 999;
      await catalog.listCourses();
      expect(source).toHaveBeenCalledTimes(1);

      clock = 1000;
      await catalog.listCourses();
      expect(source).toHaveBeenCalledTimes(2);
    });

    it('should refetch after clearCache', async () => {
      const source = jest.fn().mockResolvedValue(rows);
      const catalog = new AirtableCourseCatalog({ cacheTtlMs: 60_000, source });

      await catalog.listCourses();
      catalog.clearCache();
      await catalog.listCourses();
      expect(source).toHaveBeenCalledTimes(2);
    });

    it('should report an unavailable catalog and recover on the next call', async () => {
      const source = jest.fn()
        .mockRejectedValueOnce(new Error('connection reset'))
        .mockResolvedValueOnce(rows);
      const catalog = new AirtableCourseCatalog({ cacheTtlMs: 1000, source });

      await expect(catalog.listCourses()).rejects.toBeInstanceOf(CatalogUnavailableError);
      await expect(catalog.listCourses({ maxCredit: 3 })).resolves.toHaveLength(1);
      expect(source).toHaveBeenCalledTimes(2);
    });
  });
});
