/**
 * Time the solver by repeating each solve and averaging the wall-clock cost.
 *
 * Usage:
 *     npm run benchmark [sequential|parallel|batch] [executions] [problems.yaml] [puzzleName]
 *
 * `sequential` and `parallel` print the mean time per puzzle; `batch` prints
 * the mean time to solve the whole collection concurrently. A puzzle name
 * restricts the run to that puzzle.
 */

/* eslint-disable no-console -- CLI script output. */

import {
  dirname,
  resolve
} from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  benchmarkBatch,
  benchmarkPuzzles,
  DEFAULT_EXECUTIONS
} from '../src/benchmark.ts';
import { loadPuzzleCollection } from '../src/puzzleFile.ts';

type Mode = 'batch' | 'parallel' | 'sequential';

const FIRST_CLI_ARG_INDEX = 2;
const MODES: readonly Mode[] = ['batch', 'parallel', 'sequential'];
const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..');
const DEFAULT_PROBLEMS = resolve(ROOT, 'puzzles', 'problems.yaml');
const MS_DIGITS = 3;

function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

async function main(): Promise<void> {
  const [modeArg = 'sequential', executionsArg, problemsArg, puzzleName] = process.argv.slice(FIRST_CLI_ARG_INDEX);
  if (!isMode(modeArg)) {
    console.error(`Usage: npm run benchmark [${MODES.join('|')}] [executions] [problems.yaml] [puzzleName]`);
    process.exit(1);
  }
  const executions = executionsArg === undefined ? DEFAULT_EXECUTIONS : parseInt(executionsArg, 10);

  let puzzles = loadPuzzleCollection(problemsArg ?? DEFAULT_PROBLEMS);
  if (puzzleName !== undefined) {
    puzzles = puzzles.filter((puzzle) => puzzle.name === puzzleName);
    if (puzzles.length === 0) {
      console.error(`Error: no puzzle named ${puzzleName}`);
      process.exit(1);
    }
  }

  const start = performance.now();
  if (modeArg === 'batch') {
    const meanMs = await benchmarkBatch(puzzles, executions);
    console.log(`batch of ${String(puzzles.length)}: ${meanMs.toFixed(MS_DIGITS)} ms`);
  } else {
    for (const timing of await benchmarkPuzzles(puzzles, modeArg, executions)) {
      console.log(`${timing.name}: ${timing.meanMs.toFixed(MS_DIGITS)} ms`);
    }
  }
  console.log(`Total ${(performance.now() - start).toFixed(MS_DIGITS)} ms over ${String(executions)} executions (${modeArg})`);
}

try {
  await main();
} catch (error: unknown) {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
}

/* eslint-enable no-console -- End CLI script output. */
