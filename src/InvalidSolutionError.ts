import type { Grid } from './Grid.ts';

import { gridToString } from './Grid.ts';

/**
 * The search reported a grid as solved that breaks a Sudoku rule. This is an
 * engine fault, not a property of the puzzle.
 */
export class InvalidSolutionError extends Error {
  public override readonly name = 'InvalidSolutionError';

  public constructor(public readonly grid: Grid) {
    super(`Solver produced an invalid solution:\n${gridToString(grid)}`);
  }
}
