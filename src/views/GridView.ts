import type { Grid } from '../Grid.ts';

/**
 * Rearranges a grid so that one kind of house (row, column or block) lies
 * along the rows, letting a single row-elimination routine serve all three.
 * `restore(project(grid))` must equal `grid`.
 */
export interface GridView {
  project(grid: Grid): Grid;
  restore(grid: Grid): Grid;
}
