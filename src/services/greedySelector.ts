import { Course, RandomSource } from '../types';
import { shuffle } from '../utils/random';
import { ConflictGraph } from './conflictGraph';

export const DEFAULT_GREEDY_TRIALS = 10;

export interface GreedyOptions {
  graph: ConflictGraph;
  random: RandomSource;
  trials?: number;
}

export interface GreedyResult {
  credits: number;
  names: Set<string>;
}

/**
 * Approximate `targetCredits` from below with a randomized greedy pass.
 *
 * Each trial walks a fresh shuffle of the candidates, skips courses that clash
 * with something already taken in that trial, and stops at the first course
 * that no longer fits. Because the outcome depends on order, several trials
 * are run and the highest total wins (earliest trial on ties).
 */
export function approximate(
  candidates: readonly Course[],
  targetCredits: number,
  options: GreedyOptions
): GreedyResult {
  const { graph, random, trials = DEFAULT_GREEDY_TRIALS } = options;

  if (candidates.length === 0 || targetCredits <= 0) {
    return { credits: 0, names: new Set() };
  }

  let bestCredits = 0;
  let bestNames: string[] = [];

  for (let trial = 0; trial < trials; trial++) {
    const order = shuffle(candidates, random);
    const accepted: string[] = [];
    let total = 0;

    for (const course of order) {
      if (graph.conflictsWithAny(course.name, accepted)) {
        continue;
      }
      if (total + course.credit > targetCredits) {
        break;
      }
      accepted.push(course.name);
      total += course.credit;
    }

    if (total > bestCredits) {
      bestCredits = total;
      bestNames = accepted;
    }
  }

  return { credits: bestCredits, names: new Set(bestNames) };
}
