/**
 * Solve every puzzle in a YAML collection concurrently and check the results
 * against the expected solutions.
 *
 * Usage:
 *     npm run solve [problems.yaml] [solutions.yaml]
 *
 * Defaults to puzzles/problems.yaml and puzzles/solutions.yaml.
 * Exits with code 1 when any puzzle is unsolved or differs from its expected solution.
 */

/* eslint-disable no-console -- CLI script output. */

import type {
  Solution,
  SolveReporter
} from '../src/solver.ts';

import {
  dirname,
  resolve
} from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  formatGrid,
  pairSolutions,
  solutionToDigits
} from '../src/parsers.ts';
import { loadPuzzleCollection } from '../src/puzzleFile.ts';
import { solveAll } from '../src/solver.ts';

const FIRST_CLI_ARG_INDEX = 2;
const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');
const DEFAULT_PROBLEMS = resolve(ROOT, 'puzzles', 'problems.yaml');
const DEFAULT_SOLUTIONS = resolve(ROOT, 'puzzles', 'solutions.yaml');

class ConsoleReporter implements SolveReporter {
  private solvedCount = 0;

  public constructor(private readonly total: number) {
  }

  public puzzleSolved(name: string, solution: Solution): void {
    this.solvedCount++;
    const status = solutionToDigits(solution) === null ? 'no solution' : 'solved';
    console.log(`[${String(this.solvedCount)}/${String(this.total)}] ${name}: ${status}`);
  }

  public puzzleStarted(name: string): void {
    console.log(`Solving ${name}...`);
  }
}

async function main(): Promise<void> {
  const problemsPath = process.argv[FIRST_CLI_ARG_INDEX] ?? DEFAULT_PROBLEMS;
  const solutionsPath = process.argv[FIRST_CLI_ARG_INDEX + 1] ?? DEFAULT_SOLUTIONS;

  const puzzles = loadPuzzleCollection(problemsPath);
  const pairs = pairSolutions(puzzles, loadPuzzleCollection(solutionsPath));

  const results = await solveAll(puzzles, { reporter: new ConsoleReporter(puzzles.length) });

  let failures = 0;
  for (const [index, result] of results.entries()) {
    const pair = pairs[index];
    const digits = solutionToDigits(result.solution);
    const matches = pair !== undefined && JSON.stringify(digits) === JSON.stringify(pair.expected);
    console.log(`\n${result.name}${matches ? '' : ' (MISMATCH)'}`);
    console.log(formatGrid(result.solution));
    if (!matches) {
      failures++;
    }
  }

  if (failures > 0) {
    console.error(`\n${String(failures)} of ${String(results.length)} puzzles did not match their expected solution`);
    process.exit(1);
  }
  console.log(`\nAll ${String(results.length)} puzzles solved`);
}

try {
  await main();
} catch (error: unknown) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

/* eslint-enable no-console -- End CLI script output. */
