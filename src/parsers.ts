import type {
  DigitGrid,
  GridOutcome
} from './Grid.ts';
import type { Puzzle } from './solver.ts';

import { isContradiction } from './Cell.ts';
import {
  BLOCK_SIZE,
  GRID_SIZE
} from './Grid.ts';

export interface PuzzleWithSolution {
  readonly expected: DigitGrid;
  readonly puzzle: Puzzle;
}

const BLOCK_ROW_SEPARATOR = '------+-------+------';
const NO_SOLUTION_TEXT = 'no solution';
const SEPARATOR_PATTERN = /[\s|]/g;
const UNKNOWN_CHARS = new Set(['.', '0', '_']);

/**
 * Renders a grid as nine lines with ` | ` between block columns and a
 * dashed line between block rows. Undecided cells show as `.`.
 */
export function formatGrid(outcome: GridOutcome): string {
  if (isContradiction(outcome)) {
    return NO_SOLUTION_TEXT;
  }
  const lines: string[] = [];
  for (const [r, row] of outcome.entries()) {
    if (r > 0 && r % BLOCK_SIZE === 0) {
      lines.push(BLOCK_ROW_SEPARATOR);
    }
    const groups: string[] = [];
    for (let c = 0; c < row.length; c += BLOCK_SIZE) {
      groups.push(row.slice(c, c + BLOCK_SIZE).map((cell) => cell.kind === 'fixed' ? String(cell.value) : '.').join(' '));
    }
    lines.push(groups.join(' | '));
  }
  return lines.join('\n');
}

/**
 * Aligns puzzles with their expected solutions by position. Names must agree.
 */
export function pairSolutions(puzzles: readonly Puzzle[], solutions: readonly Puzzle[]): PuzzleWithSolution[] {
  if (puzzles.length !== solutions.length) {
    throw new Error(`Found ${String(puzzles.length)} puzzles but ${String(solutions.length)} solutions`);
  }
  return puzzles.map((puzzle, index) => {
    const solution = solutions[index];
    if (solution?.name !== puzzle.name) {
      throw new Error(`Solution ${String(index + 1)} is named ${solution?.name ?? '(missing)'}, expected ${puzzle.name}`);
    }
    return { expected: solution.grid, puzzle };
  });
}

export function parseGrid(rows: readonly string[]): number[][] {
  if (rows.length !== GRID_SIZE) {
    throw new Error(`Grid must have ${String(GRID_SIZE)} rows, got ${String(rows.length)}`);
  }
  return rows.map(parseGridRow);
}

/**
 * Parses one row such as `53. .7. ...`: digits 1-9 are givens, `.`, `0` and
 * `_` are unknown, spaces and `|` are ignored.
 */
export function parseGridRow(text: string): number[] {
  const compact = text.replace(SEPARATOR_PATTERN, '');
  if (compact.length !== GRID_SIZE) {
    throw new Error(`Grid row must have ${String(GRID_SIZE)} cells: ${text}`);
  }
  return Array.from(compact, (ch) => {
    if (UNKNOWN_CHARS.has(ch)) {
      return 0;
    }
    if (!/^[1-9]$/.test(ch)) {
      throw new Error(`Bad cell '${ch}' in grid row: ${text}`);
    }
    return parseInt(ch, 10);
  });
}

/**
 * Converts a fully decided grid back to digits; a contradiction becomes `null`.
 */
export function solutionToDigits(outcome: GridOutcome): null | number[][] {
  if (isContradiction(outcome)) {
    return null;
  }
  return outcome.map((row) => row.map((cell) => {
    if (cell.kind !== 'fixed') {
      throw new Error('Solution still has undecided cells');
    }
    return cell.value;
  }));
}
