import type { Digit } from './Cell.ts';
import type {
  Grid,
  GridOutcome
} from './Grid.ts';

import {
  CONTRADICTION,
  fixedCell,
  isContradiction,
  isDecided
} from './Cell.ts';
import { refine } from './constraints.ts';
import {
  compareGrids,
  replaceCell
} from './Grid.ts';

export interface GuessChoice {
  readonly columnId: number;
  readonly rowId: number;
  readonly values: readonly Digit[];
}

interface RankedGrid {
  readonly grid: Grid;
  readonly hardness: number;
}

/**
 * Picks the undecided cell with the fewest candidates, breaking ties by the
 * lowest row and then the lowest column.
 */
export function guess(grid: Grid): GuessChoice {
  let best: GuessChoice | null = null;
  for (const [r, row] of grid.entries()) {
    for (const [c, cell] of row.entries()) {
      if (cell.kind !== 'candidates') {
        continue;
      }
      if (!best || cell.values.length < best.values.length) {
        best = { columnId: c + 1, rowId: r + 1, values: cell.values };
      }
    }
  }
  if (!best) {
    throw new Error('Cannot guess in a grid without undecided cells');
  }
  return best;
}

/**
 * One refined child grid per candidate of the guessed cell, contradictions
 * dropped, easiest first. Children of equal hardness are ordered by
 * {@link compareGrids}, so the branch order never depends on candidate order.
 */
export function guesses(grid: Grid): Grid[] {
  const { columnId, rowId, values } = guess(grid);
  const ranked: RankedGrid[] = [];
  for (const value of values) {
    const child = refine(replaceCell(grid, rowId, columnId, fixedCell(value)));
    if (!isContradiction(child)) {
      ranked.push({ grid: child, hardness: hardness(child) });
    }
  }
  return ranked
    .sort((a, b) => a.hardness === b.hardness ? compareGrids(a.grid, b.grid) : a.hardness - b.hardness)
    .map((entry) => entry.grid);
}

/**
 * Total number of candidates left in the grid.
 */
export function hardness(grid: Grid): number {
  let total = 0;
  for (const row of grid) {
    for (const cell of row) {
      if (cell.kind === 'candidates') {
        total += cell.values.length;
      }
    }
  }
  return total;
}

export function solved(outcome: GridOutcome): boolean {
  if (isContradiction(outcome)) {
    return true;
  }
  return outcome.every((row) => row.every(isDecided));
}

export function solveOne(candidates: readonly Grid[]): GridOutcome {
  for (const candidate of candidates) {
    const solution = solveRefined(candidate);
    if (!isContradiction(solution)) {
      return solution;
    }
  }
  return CONTRADICTION;
}

/**
 * Depth-first search over already refined grids. Branches are explored one
 * at a time: each sibling is tried only after the previous one has failed.
 */
export function solveRefined(outcome: GridOutcome): GridOutcome {
  if (isContradiction(outcome) || solved(outcome)) {
    return outcome;
  }
  return solveOne(guesses(outcome));
}
