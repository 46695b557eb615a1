import type {
  Cell,
  Digit
} from './Cell.ts';
import type { TaskExecutor } from './executors.ts';
import type {
  DigitGrid,
  Grid,
  GridOutcome,
  Row,
  RowOutcome
} from './Grid.ts';
import type { GridView } from './views/GridView.ts';

import {
  ALL_DIGITS,
  candidatesCell,
  CONTRADICTION,
  fixedCell,
  isContradiction,
  isDigit
} from './Cell.ts';
import { fanOutRows } from './coordinator.ts';
import { DEFAULT_EXECUTOR } from './executors.ts';
import {
  gridsEqual,
  joinRows
} from './Grid.ts';
import { ensureNonNullable } from './typeGuards.ts';
import { createDefaultViews } from './views/createDefaultViews.ts';

const VIEWS: readonly GridView[] = createDefaultViews();

export function fill(digits: DigitGrid): Grid {
  return digits.map((row) => row.map((value): Cell => isDigit(value) ? fixedCell(value) : candidatesCell(ALL_DIGITS)));
}

/**
 * Runs row, column and block elimination until a whole cycle changes nothing.
 * Stops at the first contradiction without finishing the cycle.
 */
export function refine(grid: Grid): GridOutcome {
  let current = grid;
  let isFixpoint = false;
  while (!isFixpoint) {
    const next = refineCycle(current);
    if (isContradiction(next)) {
      return CONTRADICTION;
    }
    isFixpoint = gridsEqual(next, current);
    if (!isFixpoint) {
      current = next;
    }
  }
  return current;
}

/**
 * Same fixpoint as {@link refine}, but the nine rows of every pass are
 * refined as concurrent tasks and joined before the next pass starts.
 */
export async function refineParallel(grid: Grid, executor: TaskExecutor = DEFAULT_EXECUTOR): Promise<GridOutcome> {
  let current = grid;
  let isFixpoint = false;
  while (!isFixpoint) {
    const next = await refineCycleConcurrently(current, executor);
    if (isContradiction(next)) {
      return CONTRADICTION;
    }
    isFixpoint = gridsEqual(next, current);
    if (!isFixpoint) {
      current = next;
    }
  }
  return current;
}

/**
 * Removes the row's fixed digits from every candidate set. A candidate set
 * left empty, or two cells holding the same digit, contradicts the row.
 * Returns the input row itself when nothing changes.
 */
export function refineRow(row: Row): RowOutcome {
  const entries = new Set<Digit>();
  for (const cell of row) {
    if (cell.kind === 'fixed') {
      entries.add(cell.value);
    }
  }

  const refined = row.map((cell): Cell => {
    if (cell.kind !== 'candidates') {
      return cell;
    }
    const remaining = cell.values.filter((value) => !entries.has(value));
    if (remaining.length === 0) {
      return CONTRADICTION;
    }
    if (remaining.length === 1) {
      return fixedCell(ensureNonNullable(remaining[0]));
    }
    return remaining.length === cell.values.length ? cell : candidatesCell(remaining);
  });

  const seen = new Set<Digit>();
  for (const cell of refined) {
    if (cell.kind === 'contradiction') {
      return CONTRADICTION;
    }
    if (cell.kind === 'fixed') {
      if (seen.has(cell.value)) {
        return CONTRADICTION;
      }
      seen.add(cell.value);
    }
  }
  return refined.some((cell, index) => cell !== row[index]) ? refined : row;
}

export function refineRows(grid: Grid): GridOutcome {
  return joinRows(grid.map(refineRow));
}

function refineCycle(grid: Grid): GridOutcome {
  let current = grid;
  for (const view of VIEWS) {
    const refined = refineRows(view.project(current));
    if (isContradiction(refined)) {
      return CONTRADICTION;
    }
    current = view.restore(refined);
  }
  return current;
}

async function refineCycleConcurrently(grid: Grid, executor: TaskExecutor): Promise<GridOutcome> {
  let current = grid;
  for (const view of VIEWS) {
    const refined = await fanOutRows(view.project(current), refineRow, executor);
    if (isContradiction(refined)) {
      return CONTRADICTION;
    }
    current = view.restore(refined);
  }
  return current;
}
