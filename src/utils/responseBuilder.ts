import { SelectionResult, Solution, SolutionEntry } from '../types';

export interface RankedSolution {
  rank: number;
  totalCredits: number;
  courses: SolutionEntry[];
}

export interface SelectResponse {
  ok: true;
  solutions: RankedSolution[];
  debug: {
    seed: number;
    candidates: number;
    removedByBusySchedule: number;
    fieldMatches: number;
    formatMatches: number;
    trials: number;
    failedTrials: number;
    executionTime: number;
  };
}

export function totalCredits(solution: Solution): number {
  return solution.reduce((sum, entry) => sum + entry.credit, 0);
}

/**
 * Shape solver output for the presentation layer.
 * Solutions keep the order they were found in; rank is 1-based.
 */
export function buildSelectResponse(result: SelectionResult, meta: { seed: number; executionTime: number }): SelectResponse {
  return {
    ok: true,
    solutions: result.solutions.map((solution, index) => ({
      rank: index + 1,
      totalCredits: totalCredits(solution),
      courses: solution,
    })),
    debug: {
      seed: meta.seed,
      ...result.stats,
      executionTime: meta.executionTime,
    },
  };
}

/**
 * One line per course, e.g. "Dialog Systems (wed. 09:00-11:30, 6 credits)"
 */
export function describeSolution(solution: Solution): string[] {
  return solution.map(entry => `${entry.name} (${entry.time}, ${entry.credit} ${entry.credit === 1 ? 'credit' : 'credits'})`);
}
