import { Course } from '../types';
import { ConflictGraph } from './conflictGraph';

export interface ExactSearchOptions {
  graph: ConflictGraph;
  /** Upper bound on visited search nodes; unlimited when omitted */
  maxSteps?: number;
}

export type ExactSearchResult =
  | { status: 'found'; names: string[]; steps: number }
  | { status: 'none'; steps: number }
  | { status: 'budget-exhausted'; steps: number };

class BudgetExhausted extends Error {}

/**
 * Depth-first search for a conflict-free subset of `candidates` whose credits sum exactly to `targetCredits`.
 *
 * Candidates are visited in the given order. At each position the course is
 * first included, then excluded; a course that clashes with the current path
 * fails the whole branch. Every piece of search state lives in this call, so the
 * function is safe to re-enter. Returned names follow candidate order.
 */
export function solveExact(
  candidates: readonly Course[],
  targetCredits: number,
  options: ExactSearchOptions
): ExactSearchResult {
  const { graph, maxSteps } = options;
  const nodes = candidates.map(course => graph.indexOf(course.name));

  if (targetCredits <= 0) {
    return { status: 'none', steps: 0 };
  }

  let steps = 0;

  const clashesWithPath = (index: number, path: readonly number[]): boolean =>
    path.some(prev => graph.conflictsAt(nodes[prev], nodes[index]));

  const search = (index: number, credits: number, path: readonly number[]): number[] | null => {
    steps++;
    if (maxSteps !== undefined && steps > maxSteps) {
      throw new BudgetExhausted();
    }

    if (index >= candidates.length) return null;
    if (clashesWithPath(index, path)) return null;

    // Include the current course
    const withCurrent = credits + candidates[index].credit;
    if (withCurrent === targetCredits) {
      return [...path, index];
    }
    if (withCurrent < targetCredits) {
      const found = search(index + 1, withCurrent, [...path, index]);
      if (found) return found;
    }

    // Exclude it
    return search(index + 1, credits, path);
  };

  try {
    const found = search(0, 0, []);
    if (!found) {
      return { status: 'none', steps };
    }
    return { status: 'found', names: found.map(i => candidates[i].name), steps };
  } catch (error) {
    if (error instanceof BudgetExhausted) {
      return { status: 'budget-exhausted', steps: maxSteps ?? steps };
    }
    throw error;
  }
}
