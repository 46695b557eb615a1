import type { TaskExecutor } from './executors.ts';
import type {
  DigitGrid,
  Grid,
  GridOutcome,
  Row,
  RowOutcome
} from './Grid.ts';

import { DEFAULT_EXECUTOR } from './executors.ts';
import { joinRows } from './Grid.ts';
import { Mailbox } from './Mailbox.ts';
import { ensureNonNullable } from './typeGuards.ts';

export interface FulfilledOutcome<T> {
  readonly index: number;
  readonly status: 'fulfilled';
  readonly value: T;
}

export interface PuzzleFanOutOptions<T> {
  readonly executor?: TaskExecutor;
  onPuzzleSolved?(name: string, result: T): void;
  onPuzzleStarted?(name: string): void;
}

export interface RejectedOutcome {
  readonly index: number;
  readonly reason: unknown;
  readonly status: 'rejected';
}

export interface RunTasksOptions<T> {
  readonly executor?: TaskExecutor;
  onOutcome?(outcome: FulfilledOutcome<T>): void;
}

export interface SolvedPuzzle<T> {
  readonly name: string;
  readonly solution: T;
}

export type Task<T> = () => T;

export type TaskOutcome<T> = FulfilledOutcome<T> | RejectedOutcome;

interface NamedGrid {
  readonly grid: DigitGrid;
  readonly name: string;
}

/**
 * Refines every row of `grid` in its own task and reassembles the rows in
 * their original order, whatever order the tasks finish in.
 */
export async function fanOutRows(
  grid: Grid,
  refineRow: (row: Row) => RowOutcome,
  executor: TaskExecutor = DEFAULT_EXECUTOR
): Promise<GridOutcome> {
  const rows = await runTasks(grid.map((row) => (): RowOutcome => refineRow(row)), { executor });
  return joinRows(rows);
}

/**
 * Solves every puzzle in its own task and waits for exactly one completion
 * signal per puzzle. Results come back in input order.
 */
export async function fanOutPuzzles<T>(
  puzzles: readonly NamedGrid[],
  solve: (grid: DigitGrid) => T,
  options: PuzzleFanOutOptions<T> = {}
): Promise<SolvedPuzzle<T>[]> {
  const tasks = puzzles.map((puzzle) => (): T => {
    options.onPuzzleStarted?.(puzzle.name);
    return solve(puzzle.grid);
  });
  const solutions = await runTasks(tasks, {
    executor: options.executor ?? DEFAULT_EXECUTOR,
    onOutcome: (outcome) => {
      options.onPuzzleSolved?.(ensureNonNullable(puzzles[outcome.index]).name, outcome.value);
    }
  });
  return solutions.map((solution, index) => ({
    name: ensureNonNullable(puzzles[index]).name,
    solution
  }));
}

/**
 * Launches one job per task and joins their outcomes.
 *
 * Outcomes are matched to tasks by index, not by arrival order. The join
 * rejects with the first failure it receives; there is no cancellation, so
 * the remaining tasks still run to completion and their outcomes are dropped.
 * There is no timeout: a task that never finishes keeps the join waiting.
 */
export async function runTasks<T>(tasks: readonly Task<T>[], options: RunTasksOptions<T> = {}): Promise<T[]> {
  const executor = options.executor ?? DEFAULT_EXECUTOR;
  const mailbox = new Mailbox<TaskOutcome<T>>();
  for (const [index, task] of tasks.entries()) {
    executor.execute(() => {
      mailbox.send(settle(index, task));
    });
  }

  const slots: (FulfilledOutcome<T> | undefined)[] = tasks.map(() => undefined);
  let remaining = tasks.length;
  while (remaining > 0) {
    const outcome = await mailbox.receive();
    if (outcome.status === 'rejected') {
      throw toError(outcome.reason);
    }
    if (slots[outcome.index] !== undefined) {
      throw new Error(`Task ${String(outcome.index)} reported twice`);
    }
    slots[outcome.index] = outcome;
    options.onOutcome?.(outcome);
    remaining--;
  }
  return slots.map((slot) => ensureNonNullable(slot).value);
}

function settle<T>(index: number, task: Task<T>): TaskOutcome<T> {
  try {
    return { index, status: 'fulfilled', value: task() };
  } catch (error: unknown) {
    return { index, reason: error, status: 'rejected' };
  }
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
