import type { Grid } from '../Grid.ts';
import type { GridView } from './GridView.ts';

import {
  fromBlockView,
  toBlockView
} from '../Grid.ts';

export class BlockView implements GridView {
  public project(grid: Grid): Grid {
    return toBlockView(grid);
  }

  public restore(grid: Grid): Grid {
    return fromBlockView(grid);
  }
}
