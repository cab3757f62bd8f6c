import { Course } from '../types';
import { AppError, ValidationError } from '../utils/errors';
import { intervalsOverlap } from '../utils/timeParser';

/**
 * Pairwise time-conflict relation over a fixed candidate pool.
 *
 * Built once per pool in O(n²) and indexed by course position, so lookups are
 * O(1) and independent of argument order. Course names never take part in key
 * construction; they are only resolved to indices.
 */
export class ConflictGraph {
  private readonly indexByName = new Map<string, number>();
  // Upper triangle, row-major: entry for (i, j) with i < j
  private readonly cells: Uint8Array;
  readonly size: number;

  constructor(courses: readonly Course[]) {
    this.size = courses.length;

    courses.forEach((course, index) => {
      if (this.indexByName.has(course.name)) {
        throw new ValidationError(`Duplicate course name "${course.name}" in candidate pool`, { name: course.name });
      }
      this.indexByName.set(course.name, index);
    });

    this.cells = new Uint8Array((this.size * (this.size - 1)) / 2);
    for (let i = 0; i < this.size; i++) {
      for (let j = i + 1; j < this.size; j++) {
        if (intervalsOverlap(courses[i].intervals, courses[j].intervals)) {
          this.cells[this.cellIndex(i, j)] = 1;
        }
      }
    }
  }

  private cellIndex(i: number, j: number): number {
    const [lo, hi] = i < j ? [i, j] : [j, i];
    // Rows 0..lo-1 hold (size-1) + (size-2) + ... + (size-lo) cells
    return lo * this.size - (lo * (lo + 1)) / 2 + (hi - lo - 1);
  }

  /**
   * Position of a course in the pool the graph was built from
   */
  indexOf(name: string): number {
    const index = this.indexByName.get(name);
    if (index === undefined) {
      throw new AppError(`Course "${name}" is not part of the conflict graph`, {
        code: 'CONFLICT_GRAPH_INCONSISTENT',
        details: { name },
      });
    }
    return index;
  }

  has(name: string): boolean {
    return this.indexByName.has(name);
  }

  conflictsAt(i: number, j: number): boolean {
    if (i === j) return false;
    return this.cells[this.cellIndex(i, j)] === 1;
  }

  conflicts(a: string, b: string): boolean {
    return this.conflictsAt(this.indexOf(a), this.indexOf(b));
  }

  conflictsWithAny(name: string, others: Iterable<string>): boolean {
    const index = this.indexOf(name);
    for (const other of others) {
      if (this.conflictsAt(index, this.indexOf(other))) {
        return true;
      }
    }
    return false;
  }

  /**
   * Number of conflicting pairs, for diagnostics
   */
  edgeCount(): number {
    let count = 0;
    for (const cell of this.cells) count += cell;
    return count;
  }
}
