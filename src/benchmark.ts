import type { Puzzle } from './solver.ts';

import {
  solve,
  solveAll,
  solveParallel
} from './solver.ts';

export type BenchmarkMode = 'parallel' | 'sequential';

export interface PuzzleTiming {
  readonly meanMs: number;
  readonly name: string;
}

export const DEFAULT_EXECUTIONS = 42;

/**
 * Runs `run` `executions` times, one after another, and returns the mean
 * wall-clock time of a single run in milliseconds.
 */
export async function benchmark(run: () => Promise<unknown> | unknown, executions = DEFAULT_EXECUTIONS): Promise<number> {
  if (!Number.isInteger(executions) || executions < 1) {
    throw new Error(`Executions must be a positive integer, got ${String(executions)}`);
  }
  const start = performance.now();
  for (let i = 0; i < executions; i++) {
    await run();
  }
  return (performance.now() - start) / executions;
}

export function benchmarkBatch(puzzles: readonly Puzzle[], executions = DEFAULT_EXECUTIONS): Promise<number> {
  return benchmark(() => solveAll(puzzles), executions);
}

export async function benchmarkPuzzles(
  puzzles: readonly Puzzle[],
  mode: BenchmarkMode,
  executions = DEFAULT_EXECUTIONS
): Promise<PuzzleTiming[]> {
  const timings: PuzzleTiming[] = [];
  for (const puzzle of puzzles) {
    const run = mode === 'parallel'
      ? (): Promise<unknown> => solveParallel(puzzle.grid)
      : (): unknown => solve(puzzle.grid);
    timings.push({ meanMs: await benchmark(run, executions), name: puzzle.name });
  }
  return timings;
}
