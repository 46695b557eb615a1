import type { GridView } from './GridView.ts';

import { BlockView } from './BlockView.ts';
import { ColumnView } from './ColumnView.ts';
import { RowView } from './RowView.ts';

export function createDefaultViews(): GridView[] {
  return [
    new RowView(),
    new ColumnView(),
    new BlockView()
  ];
}
