import type { Grid } from '../Grid.ts';
import type { GridView } from './GridView.ts';

export class RowView implements GridView {
  public project(grid: Grid): Grid {
    return grid;
  }

  public restore(grid: Grid): Grid {
    return grid;
  }
}
