/**
 * Course catalog lookup
 * Supplies the candidate pool (already narrowed by semester and credit) to the course picker
 */

import Airtable from 'airtable';
import { CatalogFilter, RawCourseRecord } from '../types';
import { logger } from '../utils/logger';
import { CatalogUnavailableError } from '../utils/errors';

export interface CourseCatalog {
  listCourses(filter?: CatalogFilter): Promise<RawCourseRecord[]>;
}

export interface CatalogRecord {
  id: string;
  fields: Record<string, unknown>;
}

export type RecordSource = () => Promise<CatalogRecord[]>;

interface CacheEntry {
  data: RawCourseRecord[];
  timestamp: number;
}

export function applyFilter(courses: readonly RawCourseRecord[], filter: CatalogFilter = {}): RawCourseRecord[] {
  let filtered = [...courses];

  if (filter.semester) {
    const semester = filter.semester.trim().toLowerCase();
    filtered = filtered.filter(c => (c.Semester || '').trim().toLowerCase() === semester);
  }

  if (filter.maxCredit !== undefined) {
    const maxCredit = filter.maxCredit;
    filtered = filtered.filter(c => Number(c.Credit) <= maxCredit);
  }

  return filtered;
}

/**
 * Catalog over a fixed list of records (local data, tests)
 */
export class InMemoryCourseCatalog implements CourseCatalog {
  constructor(private readonly courses: readonly RawCourseRecord[]) {}

  async listCourses(filter?: CatalogFilter): Promise<RawCourseRecord[]> {
    return applyFilter(this.courses, filter);
  }
}

function pickField(fields: Record<string, unknown>, names: readonly string[]): unknown {
  for (const name of names) {
    if (fields[name] !== undefined && fields[name] !== null) {
      return fields[name];
    }
  }
  return undefined;
}

function asText(value: unknown, joiner = ', '): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) {
    const parts = value.filter((v): v is string => typeof v === 'string').map(v => v.trim());
    return parts.length > 0 ? parts.join(joiner) : undefined;
  }
  return undefined;
}

/**
 * Map an Airtable row onto the upstream course record shape.
 * Linked/multi-select values are joined; rows without a name, credit or dates are skipped.
 */
export function normalizeRecord(record: CatalogRecord): RawCourseRecord | null {
  const { fields } = record;

  const name = asText(pickField(fields, ['Name', 'name', 'Course', 'Title']));
  const creditValue = pickField(fields, ['Credit', 'credit', 'Credits', 'credits']);
  const dates = asText(pickField(fields, ['Dates', 'dates', 'Schedule', 'schedule']), '; ');

  const credit = typeof creditValue === 'number' || typeof creditValue === 'string' ? creditValue : undefined;

  if (!name || credit === undefined || !dates) {
    logger.warn('Skipping catalog record with missing name, credit or dates', {
      recordId: record.id,
      fields: Object.keys(fields),
    });
    return null;
  }

  return {
    Name: name,
    Credit: credit,
    Field: asText(pickField(fields, ['Field', 'field', 'Fields'])) ?? '',
    Format: asText(pickField(fields, ['Format', 'format', 'Formats'])) ?? '',
    Dates: dates,
    Semester: asText(pickField(fields, ['Semester', 'semester', 'Sms'])),
  };
}

export interface AirtableCatalogOptions {
  token: string;
  baseId: string;
  tableName: string;
  view: string;
  cacheTtlMs: number;
}

/**
 * Fetch every row of the configured table and view
 */
export function airtableRecordSource(options: AirtableCatalogOptions): RecordSource {
  Airtable.configure({ apiKey: options.token });
  const base = Airtable.base(options.baseId);

  return async () => {
    const records: CatalogRecord[] = [];
    await base(options.tableName)
      .select({ view: options.view })
      .eachPage((pageRecords, fetchNextPage) => {
        for (const record of pageRecords) {
          records.push({ id: record.id, fields: { ...record.fields } });
        }
        fetchNextPage();
      });
    return records;
  };
}

/**
 * Airtable-backed catalog with in-memory caching.
 * Concurrent callers share one in-flight fetch.
 */
export class AirtableCourseCatalog implements CourseCatalog {
  private cache: CacheEntry | null = null;
  private cachePromise: Promise<RawCourseRecord[]> | null = null;
  private readonly cacheTtlMs: number;
  private readonly source: RecordSource;
  private readonly now: () => number;

  constructor(options: { cacheTtlMs: number; source: RecordSource; now?: () => number }) {
    this.cacheTtlMs = options.cacheTtlMs;
    this.source = options.source;
    this.now = options.now ?? Date.now;
  }

  static fromConfig(options: AirtableCatalogOptions): AirtableCourseCatalog {
    return new AirtableCourseCatalog({
      cacheTtlMs: options.cacheTtlMs,
      source: airtableRecordSource(options),
    });
  }

  async listCourses(filter?: CatalogFilter): Promise<RawCourseRecord[]> {
    const courses = await this.getAllCourses();
    const filtered = applyFilter(courses, filter);
    logger.debug('Catalog lookup', {
      total: courses.length,
      filtered: filtered.length,
      semester: filter?.semester,
      maxCredit: filter?.maxCredit,
    });
    return filtered;
  }

  private async getAllCourses(): Promise<RawCourseRecord[]> {
    if (this.cache && this.now() - this.cache.timestamp < this.cacheTtlMs) {
      return this.cache.data;
    }

    if (this.cachePromise) {
      return this.cachePromise;
    }

    this.cachePromise = this.fetchCourses();
    try {
      const data = await this.cachePromise;
      this.cache = { data, timestamp: this.now() };
      return data;
    } finally {
      this.cachePromise = null;
    }
  }

  private async fetchCourses(): Promise<RawCourseRecord[]> {
    let records: CatalogRecord[];
    try {
      records = await this.source();
    } catch (error) {
      logger.error('Error fetching courses from Airtable', error);
      throw new CatalogUnavailableError('Failed to fetch courses from the catalog', {
        reason: error instanceof Error ? error.message : String(error),
      });
    }

    const courses: RawCourseRecord[] = [];
    for (const record of records) {
      const course = normalizeRecord(record);
      if (course) courses.push(course);
    }
    logger.info('Fetched courses from Airtable', { records: records.length, courses: courses.length });
    return courses;
  }

  clearCache(): void {
    this.cache = null;
    this.cachePromise = null;
  }
}
