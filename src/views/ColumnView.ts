import type { Grid } from '../Grid.ts';
import type { GridView } from './GridView.ts';

import { transpose } from '../Grid.ts';

export class ColumnView implements GridView {
  public project(grid: Grid): Grid {
    return transpose(grid);
  }

  public restore(grid: Grid): Grid {
    return transpose(grid);
  }
}
