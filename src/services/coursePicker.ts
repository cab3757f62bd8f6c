import {
  Course,
  RandomSource,
  RawCourseRecord,
  SelectionRequest,
  SelectionResult,
  Solution,
} from '../types';
import { logger, LogContext } from '../utils/logger';
import { AppError, ValidationError } from '../utils/errors';
import { createRandom, randomSeed, shuffle } from '../utils/random';
import { formatSchedule, intervalsOverlap, parseBusySchedule, parseDates } from '../utils/timeParser';
import { ConflictGraph } from './conflictGraph';
import { approximate, DEFAULT_GREEDY_TRIALS } from './greedySelector';
import { solveExact } from './exactSolver';
import { filterByPreference } from './preferenceFilter';

export const DEFAULT_SELECTION_TRIALS = 3;

export interface CoursePickerOptions {
  /** Full pipeline passes per request */
  trials?: number;
  /** Shuffles tried by each greedy stage */
  greedyTrials?: number;
  /** Node budget for the exact completion stage */
  maxSearchSteps?: number;
}

export interface SelectOptions {
  random?: RandomSource;
  maxSearchSteps?: number;
  requestId?: string;
}

export interface PassContext {
  graph: ConflictGraph;
  fieldMatches: ReadonlySet<string>;
  formatMatches: ReadonlySet<string>;
  targetCredits: number;
  random: RandomSource;
  greedyTrials: number;
  maxSearchSteps?: number;
  log?: LogContext;
}

/**
 * Coerce an upstream credit value ("3", 3, "3.0") to a positive integer
 */
export function parseCredit(value: number | string, courseName: string): number {
  const credit = typeof value === 'number' ? value : value.trim() === '' ? NaN : Number(value);
  if (!Number.isInteger(credit) || credit <= 0) {
    throw new ValidationError(`Course "${courseName}" has invalid credit value "${value}"`, {
      name: courseName,
      credit: value,
    });
  }
  return credit;
}

/**
 * Turn an upstream record into an immutable Course
 */
export function normalizeCourse(record: RawCourseRecord): Course {
  const { intervals, entries } = parseDates(record.Dates);
  return Object.freeze({
    name: record.Name,
    credit: parseCredit(record.Credit, record.Name),
    field: record.Field,
    format: record.Format,
    intervals,
    schedule: entries,
  });
}

function restrictTo(candidates: readonly Course[], names: ReadonlySet<string>): Course[] {
  return candidates.filter(course => names.has(course.name));
}

function compatibleWith(candidates: readonly Course[], chosen: Iterable<string>, graph: ConflictGraph): Course[] {
  return candidates.filter(course => !graph.conflictsWithAny(course.name, chosen));
}

function stageATarget(targetCredits: number): number {
  return Math.max(3, Math.round(0.5 * targetCredits));
}

class CoursePicker {
  private readonly trials: number;
  private readonly greedyTrials: number;
  private readonly maxSearchSteps?: number;

  constructor(options: CoursePickerOptions = {}) {
    this.trials = options.trials ?? DEFAULT_SELECTION_TRIALS;
    this.greedyTrials = options.greedyTrials ?? DEFAULT_GREEDY_TRIALS;
    this.maxSearchSteps = options.maxSearchSteps;
  }

  /**
   * One pass of the three-stage pipeline over `candidates` in their current order.
   * Returns null when the exact completion stage cannot close the credit gap.
   */
  selectOnce(candidates: readonly Course[], ctx: PassContext): string[] | null {
    const { graph, fieldMatches, formatMatches, targetCredits, random, greedyTrials } = ctx;

    // Stage A: courses matching both preferences, aiming for about half the target
    const intersection = new Set([...fieldMatches].filter(name => formatMatches.has(name)));
    const inter = approximate(restrictTo(candidates, intersection), stageATarget(targetCredits), {
      graph,
      random,
      trials: greedyTrials,
    });

    // Stage B: courses matching either preference, for whatever is left.
    // Later stages only see courses that fit around what is already chosen.
    const union = new Set([...fieldMatches, ...formatMatches]);
    for (const name of inter.names) union.delete(name);
    const unionPool = compatibleWith(restrictTo(candidates, union), inter.names, graph);
    const either = approximate(unionPool, Math.max(0, targetCredits - inter.credits), {
      graph,
      random,
      trials: greedyTrials,
    });

    const chosen = [...inter.names, ...either.names];
    const remaining = targetCredits - inter.credits - either.credits;

    logger.debug('Preference stages finished', {
      ...ctx.log,
      interCredits: inter.credits,
      unionCredits: either.credits,
      remaining,
    });

    if (remaining === 0) {
      return chosen;
    }
    if (remaining < 0) {
      return null;
    }

    // Stage C: close the gap exactly from everything not chosen yet
    const taken = new Set(chosen);
    const rest = compatibleWith(candidates.filter(course => !taken.has(course.name)), chosen, graph);
    const exact = solveExact(rest, remaining, { graph, maxSteps: ctx.maxSearchSteps });

    if (exact.status === 'found') {
      return [...chosen, ...exact.names];
    }

    if (exact.status === 'budget-exhausted') {
      logger.warn('Exact search budget exhausted', { ...ctx.log, remaining, steps: exact.steps });
    }
    return null;
  }

  /**
   * Select up to `trials` distinct course sets whose credits sum exactly to the target,
   * free of clashes with each other and with the busy schedule.
   */
  selectCourses(
    rawCandidates: readonly RawCourseRecord[],
    request: SelectionRequest,
    options: SelectOptions = {}
  ): SelectionResult {
    const { constraints } = request;
    const log: LogContext = { requestId: options.requestId };
    const random = options.random ?? createRandom(randomSeed());

    if (!Number.isInteger(constraints.targetCredits) || constraints.targetCredits <= 0) {
      throw new ValidationError('targetCredits must be a positive integer', {
        targetCredits: constraints.targetCredits,
      });
    }

    const normalized = rawCandidates.map(normalizeCourse);
    const affordable = normalized.filter(course => course.credit <= constraints.targetCredits);
    if (affordable.length < normalized.length) {
      logger.debug('Dropped courses above target credits', {
        ...log,
        dropped: normalized.length - affordable.length,
      });
    }

    const busy = parseBusySchedule(request.busySchedule);
    const candidates = affordable.filter(course => !intervalsOverlap(course.intervals, busy));
    const removedByBusySchedule = affordable.length - candidates.length;

    const graph = new ConflictGraph(candidates);
    const fieldMatches = filterByPreference(candidates, 'field', constraints.fields);
    const formatMatches = filterByPreference(candidates, 'format', constraints.formats);

    const ctx: PassContext = {
      graph,
      fieldMatches,
      formatMatches,
      targetCredits: constraints.targetCredits,
      random,
      greedyTrials: this.greedyTrials,
      maxSearchSteps: options.maxSearchSteps ?? this.maxSearchSteps,
      log,
    };

    const found: string[][] = [];
    let failedTrials = 0;
    for (let trial = 0; trial < this.trials; trial++) {
      const names = this.selectOnce(shuffle(candidates, random), ctx);
      if (names && names.length > 0) {
        found.push(names);
      } else {
        failedTrials++;
      }
    }

    const byName = new Map(candidates.map((course): [string, Course] => [course.name, course]));
    const solutions = this.uniqueSolutions(found).map(names => this.toSolution(names, byName));

    logger.info('Course selection finished', {
      ...log,
      targetCredits: constraints.targetCredits,
      candidates: candidates.length,
      removedByBusySchedule,
      conflictPairs: graph.edgeCount(),
      solutions: solutions.length,
      failedTrials,
    });

    return {
      solutions,
      stats: {
        candidates: candidates.length,
        removedByBusySchedule,
        fieldMatches: fieldMatches.size,
        formatMatches: formatMatches.size,
        trials: this.trials,
        failedTrials,
      },
    };
  }

  /**
   * Keep the first occurrence of each distinct course-name set
   */
  private uniqueSolutions(found: string[][]): string[][] {
    const seen = new Set<string>();
    const unique: string[][] = [];
    for (const names of found) {
      const key = JSON.stringify([...names].sort());
      if (!seen.has(key)) {
        seen.add(key);
        unique.push(names);
      }
    }
    return unique;
  }

  private toSolution(names: readonly string[], byName: ReadonlyMap<string, Course>): Solution {
    return names.map(name => {
      const course = byName.get(name);
      if (!course) {
        throw new AppError(`Selected course "${name}" is not in the candidate pool`, { details: { name } });
      }
      return {
        name,
        time: formatSchedule(course.schedule),
        credit: course.credit,
        intervals: course.intervals.map(i => ({ ...i })),
      };
    });
  }
}

export { CoursePicker };

export default new CoursePicker();
