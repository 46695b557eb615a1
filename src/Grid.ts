import type {
  Cell,
  Contradiction
} from './Cell.ts';

import {
  cellsEqual,
  cellToString,
  compareCells,
  CONTRADICTION,
  isContradiction
} from './Cell.ts';
import {
  assertIndexInRange,
  assertRectangular,
  ensureNonNullable
} from './typeGuards.ts';

export type DigitGrid = readonly (readonly number[])[];

export type Grid = readonly Row[];

export type GridOutcome = Contradiction | Grid;

export type Row = readonly Cell[];

export type RowOutcome = Contradiction | Row;

export const BLOCK_SIZE = 3;
export const GRID_SIZE = 9;

/**
 * Orders grids of the same shape by their first differing cell in row-major
 * order, using {@link compareCells}.
 */
export function compareGrids(a: Grid, b: Grid): number {
  for (const [r, row] of a.entries()) {
    const otherRow = ensureNonNullable(b[r]);
    for (const [c, cell] of row.entries()) {
      const order = compareCells(cell, ensureNonNullable(otherRow[c]));
      if (order !== 0) {
        return order;
      }
    }
  }
  return 0;
}

export function fromBlockView<T>(blocks: readonly (readonly T[])[]): T[][] {
  // Regrouping blocks into rows is the same permutation as grouping rows into blocks.
  return toBlockView(blocks);
}

export function gridsEqual(a: GridOutcome, b: GridOutcome): boolean {
  if (a === b) {
    return true;
  }
  if (isContradiction(a) || isContradiction(b)) {
    return isContradiction(a) && isContradiction(b);
  }
  return a.length === b.length && a.every((row, index) => rowsEqual(row, ensureNonNullable(b[index])));
}

export function gridToString(grid: GridOutcome): string {
  if (isContradiction(grid)) {
    return 'contradiction';
  }
  return grid.map((row) => row.map(cellToString).join(' ')).join('\n');
}

/**
 * Reassembles refined rows into a grid; a single contradicted row contradicts the grid.
 */
export function joinRows(rows: readonly RowOutcome[]): GridOutcome {
  const joined: Row[] = [];
  for (const row of rows) {
    if (isContradiction(row)) {
      return CONTRADICTION;
    }
    joined.push(row);
  }
  return joined;
}

/**
 * Returns a grid equal to `grid` except at the 1-based position (`rowId`, `columnId`).
 * Only the affected row is copied; every other row is shared with the input.
 */
export function replaceCell<T>(grid: readonly (readonly T[])[], rowId: number, columnId: number, value: T): (readonly T[])[] {
  assertIndexInRange(rowId, grid.length, 'Row');
  const row = ensureNonNullable(grid[rowId - 1]);
  assertIndexInRange(columnId, row.length, 'Column');
  const newRow = [...row];
  newRow[columnId - 1] = value;
  const result = [...grid];
  result[rowId - 1] = newRow;
  return result;
}

export function rowsEqual(a: RowOutcome, b: RowOutcome): boolean {
  if (a === b) {
    return true;
  }
  if (isContradiction(a) || isContradiction(b)) {
    return isContradiction(a) && isContradiction(b);
  }
  return a.length === b.length && a.every((cell, index) => cellsEqual(cell, ensureNonNullable(b[index])));
}

export function toBlockView<T>(grid: readonly (readonly T[])[]): T[][] {
  assertSquareGrid(grid);
  const blocks: T[][] = Array.from({ length: GRID_SIZE }, () => []);
  for (const [r, row] of grid.entries()) {
    for (const [c, value] of row.entries()) {
      const blockIndex = Math.floor(r / BLOCK_SIZE) * BLOCK_SIZE + Math.floor(c / BLOCK_SIZE);
      ensureNonNullable(blocks[blockIndex]).push(value);
    }
  }
  return blocks;
}

export function transpose<T>(grid: readonly (readonly T[])[]): T[][] {
  assertRectangular(grid);
  const width = grid[0]?.length ?? 0;
  const columns: T[][] = Array.from({ length: width }, () => []);
  for (const row of grid) {
    for (const [c, value] of row.entries()) {
      ensureNonNullable(columns[c]).push(value);
    }
  }
  return columns;
}

export function valueAt<T extends number | object>(grid: readonly (readonly T[])[], rowId: number, columnId: number): T {
  assertIndexInRange(rowId, grid.length, 'Row');
  const row = ensureNonNullable(grid[rowId - 1]);
  assertIndexInRange(columnId, row.length, 'Column');
  return ensureNonNullable(row[columnId - 1]);
}

function assertSquareGrid(grid: readonly (readonly unknown[])[]): void {
  if (grid.length !== GRID_SIZE || grid.some((row) => row.length !== GRID_SIZE)) {
    throw new Error(`Expected a ${String(GRID_SIZE)}x${String(GRID_SIZE)} grid`);
  }
}
