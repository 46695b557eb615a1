import {
  describe,
  expect,
  it
} from 'vitest';

import {
  candidatesCell,
  CONTRADICTION,
  fixedCell
} from '../src/Cell.ts';
import { fill } from '../src/constraints.ts';
import {
  compareGrids,
  fromBlockView,
  gridsEqual,
  gridToString,
  joinRows,
  replaceCell,
  rowsEqual,
  toBlockView,
  transpose,
  valueAt
} from '../src/Grid.ts';
import { FIRST_COMPLETION } from './gridTestHelper.ts';

// Cell value r * 9 + c (0-based) makes every position distinct.
const INDEXED: number[][] = Array.from({ length: 9 }, (_, r) => Array.from({ length: 9 }, (__, c) => r * 9 + c));

describe('transpose', () => {
  it('swaps rows and columns of a rectangular grid', () => {
    expect(transpose([[1, 2, 3], [4, 5, 6]])).toEqual([[1, 4], [2, 5], [3, 6]]);
  });

  it('is its own inverse', () => {
    const rectangular = [[1, 2, 3, 4], [5, 6, 7, 8], [9, 10, 11, 12]];
    expect(transpose(transpose(rectangular))).toEqual(rectangular);
    expect(transpose(transpose(INDEXED))).toEqual(INDEXED);
    expect(transpose(transpose([[7]]))).toEqual([[7]]);
  });

  it('rejects ragged grids', () => {
    expect(() => transpose([[1, 2], [3]])).toThrow('Row 2 has 1 cells, expected 2');
  });
});

describe('toBlockView', () => {
  it('reads each 3x3 block in row-major order', () => {
    const blocks = toBlockView(INDEXED);
    expect(blocks[0]).toEqual([0, 1, 2, 9, 10, 11, 18, 19, 20]);
    expect(blocks[1]).toEqual([3, 4, 5, 12, 13, 14, 21, 22, 23]);
    expect(blocks[4]).toEqual([30, 31, 32, 39, 40, 41, 48, 49, 50]);
    expect(blocks[8]).toEqual([60, 61, 62, 69, 70, 71, 78, 79, 80]);
  });

  it('round-trips through fromBlockView', () => {
    expect(fromBlockView(toBlockView(INDEXED))).toEqual(INDEXED);
    expect(toBlockView(fromBlockView(INDEXED))).toEqual(INDEXED);
    expect(fromBlockView(toBlockView(FIRST_COMPLETION))).toEqual(FIRST_COMPLETION);
  });

  it('only accepts 9x9 grids', () => {
    expect(() => toBlockView([[1, 2, 3]])).toThrow('Expected a 9x9 grid');
  });
});

describe('replaceCell', () => {
  it('changes exactly one 1-based position', () => {
    const replaced = replaceCell(INDEXED, 2, 3, -1);
    expect(valueAt(replaced, 2, 3)).toBe(-1);
    expect(INDEXED[1]?.[2]).toBe(11);
    expect(replaced.flat().filter((value, index) => value !== INDEXED.flat()[index])).toEqual([-1]);
  });

  it('shares the untouched rows with the input', () => {
    const replaced = replaceCell(INDEXED, 5, 5, 0);
    expect(replaced[0]).toBe(INDEXED[0]);
    expect(replaced[8]).toBe(INDEXED[8]);
    expect(replaced[4]).not.toBe(INDEXED[4]);
  });

  it('leaves the grid unchanged when writing back the existing value', () => {
    for (const [rowId, columnId] of [[1, 1], [4, 7], [9, 9]] as const) {
      expect(replaceCell(INDEXED, rowId, columnId, valueAt(INDEXED, rowId, columnId))).toEqual(INDEXED);
    }
    const grid = fill(FIRST_COMPLETION);
    expect(gridsEqual(replaceCell(grid, 3, 6, valueAt(grid, 3, 6)), grid)).toBe(true);
  });

  it('rejects out-of-range indices', () => {
    expect(() => replaceCell(INDEXED, 10, 1, 0)).toThrow('Row index 10 is outside 1..9');
    expect(() => replaceCell(INDEXED, 1, 0, 0)).toThrow('Column index 0 is outside 1..9');
  });
});

describe('valueAt', () => {
  it('reads 1-based positions', () => {
    expect(valueAt(INDEXED, 1, 1)).toBe(0);
    expect(valueAt(INDEXED, 9, 1)).toBe(72);
    expect(valueAt(INDEXED, 1, 9)).toBe(8);
  });
});

describe('gridsEqual', () => {
  it('compares cell by cell', () => {
    expect(gridsEqual(fill(FIRST_COMPLETION), fill(FIRST_COMPLETION))).toBe(true);
    const changed = replaceCell(fill(FIRST_COMPLETION), 9, 9, candidatesCell([2, 3]));
    expect(gridsEqual(changed, fill(FIRST_COMPLETION))).toBe(false);
  });

  it('treats contradiction as equal only to itself', () => {
    expect(gridsEqual(CONTRADICTION, CONTRADICTION)).toBe(true);
    expect(gridsEqual(CONTRADICTION, fill(FIRST_COMPLETION))).toBe(false);
  });
});

describe('rowsEqual', () => {
  it('compares rows and contradictions', () => {
    expect(rowsEqual([fixedCell(1), candidatesCell([2, 3])], [fixedCell(1), candidatesCell([2, 3])])).toBe(true);
    expect(rowsEqual([fixedCell(1)], CONTRADICTION)).toBe(false);
  });
});

describe('joinRows', () => {
  it('keeps rows in order', () => {
    const rows = [[fixedCell(1)], [fixedCell(2)]];
    expect(joinRows(rows)).toEqual(rows);
  });

  it('contradicts the grid when any row is contradicted', () => {
    expect(joinRows([[fixedCell(1)], CONTRADICTION, [fixedCell(2)]])).toBe(CONTRADICTION);
  });
});

describe('gridToString', () => {
  it('renders cells row by row', () => {
    expect(gridToString([[fixedCell(1), candidatesCell([2, 3])], [CONTRADICTION, fixedCell(4)]])).toBe('1 {23}\n! 4');
    expect(gridToString(CONTRADICTION)).toBe('contradiction');
  });
});

describe('compareGrids', () => {
  it('is zero for equal grids', () => {
    expect(compareGrids(fill(FIRST_COMPLETION), fill(FIRST_COMPLETION))).toBe(0);
  });

  it('decides on the first differing cell in row-major order', () => {
    const base = fill(FIRST_COMPLETION);
    // Cell (2, 9) alone would put `second` first, but cell (1, 1) differs earlier.
    const first = replaceCell(base, 2, 9, candidatesCell([1, 3]));
    const second = replaceCell(replaceCell(base, 2, 9, candidatesCell([1, 2])), 1, 1, candidatesCell([1, 9]));
    expect(compareGrids(first, second)).toBeLessThan(0);
    expect(compareGrids(second, first)).toBeGreaterThan(0);
  });

  it('follows the cell order at the differing cell', () => {
    const base = fill(FIRST_COMPLETION);
    const withCandidates = replaceCell(base, 5, 5, candidatesCell([1, 4]));
    expect(compareGrids(base, withCandidates)).toBeLessThan(0);
    expect(compareGrids(withCandidates, replaceCell(base, 5, 5, candidatesCell([1, 4, 6])))).toBeLessThan(0);
  });
});
