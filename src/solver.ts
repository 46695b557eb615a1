import type { SolvedPuzzle } from './coordinator.ts';
import type { TaskExecutor } from './executors.ts';
import type {
  DigitGrid,
  GridOutcome
} from './Grid.ts';

import {
  fill,
  refine,
  refineParallel
} from './constraints.ts';
import { fanOutPuzzles } from './coordinator.ts';
import { solveRefined } from './search.ts';
import { assertValidSolution } from './validator.ts';

export interface Puzzle {
  readonly grid: DigitGrid;
  readonly name: string;
}

export interface SolveAllOptions {
  readonly executor?: TaskExecutor;
  readonly reporter?: SolveReporter;
}

export interface SolveParallelOptions {
  readonly executor?: TaskExecutor;
}

/**
 * Receives progress from a batch solve. Calls arrive from the batch's tasks
 * in completion order, which need not match input order.
 */
export interface SolveReporter {
  puzzleSolved(name: string, solution: Solution): void;
  puzzleStarted(name: string): void;
}

export type Solution = GridOutcome;

export type { SolvedPuzzle };

/**
 * Solves `digits` (0 for an unknown cell) and returns the completed grid, or
 * the contradiction when the puzzle has no solution.
 *
 * @throws InvalidSolutionError if the search reports a grid that breaks a Sudoku rule.
 */
export function solve(digits: DigitGrid): Solution {
  const solution = solveRefined(refine(fill(digits)));
  assertValidSolution(solution);
  return solution;
}

/**
 * Solves every puzzle in its own task, each running {@link solve}. Resolves
 * once every task has reported; rejects with the first failure reported.
 */
export function solveAll(puzzles: readonly Puzzle[], options: SolveAllOptions = {}): Promise<SolvedPuzzle<Solution>[]> {
  const reporter = options.reporter;
  return fanOutPuzzles(puzzles, solve, {
    ...options.executor !== undefined && { executor: options.executor },
    ...reporter !== undefined && {
      onPuzzleSolved: (name: string, solution: Solution): void => {
        reporter.puzzleSolved(name, solution);
      },
      onPuzzleStarted: (name: string): void => {
        reporter.puzzleStarted(name);
      }
    }
  });
}

/**
 * Like {@link solve}, but the initial propagation refines rows concurrently.
 * Search itself stays sequential.
 */
export async function solveParallel(digits: DigitGrid, options: SolveParallelOptions = {}): Promise<Solution> {
  const solution = solveRefined(await refineParallel(fill(digits), options.executor));
  assertValidSolution(solution);
  return solution;
}
