import type { Row } from '../src/Grid.ts';

import {
  describe,
  expect,
  it
} from 'vitest';

import {
  ALL_DIGITS,
  candidatesCell,
  CONTRADICTION,
  fixedCell,
  isContradiction
} from '../src/Cell.ts';
import {
  fill,
  refine,
  refineParallel,
  refineRow,
  refineRows
} from '../src/constraints.ts';
import { solutionToDigits } from '../src/parsers.ts';
import {
  DeferredExecutor,
  EMPTY_DIGITS,
  FIRST_COMPLETION,
  loadProblems,
  problemNamed,
  ReversingExecutor,
  solutionNamed,
  withDigit
} from './gridTestHelper.ts';

const ALL = candidatesCell(ALL_DIGITS);

describe('fill', () => {
  it('fixes given digits and opens every unknown to 1..9', () => {
    const grid = fill(withDigit(EMPTY_DIGITS, 1, 2, 7));
    expect(grid[0]?.[1]).toEqual(fixedCell(7));
    expect(grid[0]?.[0]).toEqual(ALL);
    expect(grid[8]?.[8]).toEqual(ALL);
  });
});

describe('refineRow', () => {
  it('removes fixed digits from candidate sets', () => {
    const row: Row = [fixedCell(1), fixedCell(2), ALL, ALL, ALL, ALL, ALL, ALL, ALL];
    expect(refineRow(row)).toEqual([
      fixedCell(1),
      fixedCell(2),
      ...Array.from({ length: 7 }, () => candidatesCell([3, 4, 5, 6, 7, 8, 9]))
    ]);
  });

  it('fixes a cell left with one candidate', () => {
    const row: Row = [
      fixedCell(1), fixedCell(2), fixedCell(3), fixedCell(4), fixedCell(5),
      fixedCell(6), fixedCell(7), fixedCell(8), ALL
    ];
    expect(refineRow(row)).toEqual([...row.slice(0, 8), fixedCell(9)]);
  });

  it('contradicts the row when a candidate set runs empty', () => {
    const row: Row = [
      fixedCell(1), fixedCell(2), fixedCell(3), fixedCell(4), fixedCell(5),
      fixedCell(6), fixedCell(7), fixedCell(8), candidatesCell([1, 8])
    ];
    expect(refineRow(row)).toBe(CONTRADICTION);
  });

  it('contradicts the row when two given digits repeat', () => {
    const row: Row = [fixedCell(5), fixedCell(5), ALL, ALL, ALL, ALL, ALL, ALL, ALL];
    expect(refineRow(row)).toBe(CONTRADICTION);
  });

  it('contradicts the row when two cells narrow to the same digit', () => {
    const row: Row = [
      fixedCell(1), fixedCell(2), fixedCell(3), fixedCell(4), fixedCell(5),
      fixedCell(6), fixedCell(7), candidatesCell([1, 9]), candidatesCell([2, 9])
    ];
    expect(refineRow(row)).toBe(CONTRADICTION);
  });

  it('fixes a single-candidate cell even when nothing is eliminated', () => {
    const row: Row = [candidatesCell([5]), ALL, ALL, ALL, ALL, ALL, ALL, ALL, ALL];
    expect(refineRow(row)).toEqual([fixedCell(5), ALL, ALL, ALL, ALL, ALL, ALL, ALL, ALL]);
  });

  it('contradicts the row when two single-candidate cells hold the same digit', () => {
    const row: Row = [candidatesCell([5]), candidatesCell([5]), ALL, ALL, ALL, ALL, ALL, ALL, ALL];
    expect(refineRow(row)).toBe(CONTRADICTION);
  });

  it('returns the same row when nothing can be eliminated', () => {
    const row: Row = [candidatesCell([1, 2]), candidatesCell([1, 2]), ALL, ALL, ALL, ALL, ALL, ALL, ALL];
    expect(refineRow(row)).toBe(row);
  });
});

describe('refineRows', () => {
  it('contradicts the grid when one row is contradicted', () => {
    expect(refineRows(fill(withDigit(withDigit(EMPTY_DIGITS, 4, 1, 3), 4, 9, 3)))).toBe(CONTRADICTION);
  });
});

describe('refine', () => {
  it('returns contradiction for two 5s in the first row', () => {
    const digits = withDigit(withDigit(EMPTY_DIGITS, 1, 1, 5), 1, 2, 5);
    expect(refine(fill(digits))).toBe(CONTRADICTION);
  });

  it('detects a repeated digit in a column', () => {
    const digits = withDigit(withDigit(EMPTY_DIGITS, 2, 6, 8), 7, 6, 8);
    expect(refine(fill(digits))).toBe(CONTRADICTION);
  });

  it('detects a repeated digit in a block', () => {
    const digits = withDigit(withDigit(EMPTY_DIGITS, 4, 4, 2), 6, 6, 2);
    expect(refine(fill(digits))).toBe(CONTRADICTION);
  });

  it('completes a puzzle that needs no guessing', () => {
    const solved = refine(fill(problemNamed('gentle-ledger').grid));
    expect(solutionToDigits(solved)).toEqual(solutionNamed('gentle-ledger'));
  });

  it('fills a grid with one blank per row', () => {
    let digits: number[][] = FIRST_COMPLETION.map((row) => [...row]);
    for (let rowId = 1; rowId <= 9; rowId++) {
      digits = withDigit(digits, rowId, 10 - rowId, 0);
    }
    expect(solutionToDigits(refine(fill(digits)))).toEqual(FIRST_COMPLETION);
  });

  it('leaves an empty grid as it is', () => {
    const grid = fill(EMPTY_DIGITS);
    expect(refine(grid)).toBe(grid);
  });

  it('is idempotent once it reaches a fixpoint', () => {
    for (const puzzle of loadProblems()) {
      const once = refine(fill(puzzle.grid));
      if (isContradiction(once)) {
        throw new Error(`${puzzle.name} should refine to a grid`);
      }
      expect(refine(once)).toBe(once);
    }
  });
});

describe('refineParallel', () => {
  it('matches refine on every sample puzzle', async () => {
    for (const puzzle of loadProblems()) {
      const grid = fill(puzzle.grid);
      expect(await refineParallel(grid)).toEqual(refine(grid));
    }
  });

  it('matches refine when row tasks finish in reverse order', async () => {
    const grid = fill(problemNamed('stairwell').grid);
    expect(await refineParallel(grid, new ReversingExecutor())).toEqual(refine(grid));
  });

  it('returns contradiction for a repeated digit', async () => {
    const digits = withDigit(withDigit(EMPTY_DIGITS, 1, 1, 5), 1, 2, 5);
    expect(await refineParallel(fill(digits))).toBe(CONTRADICTION);
  });

  it('waits for all nine row tasks before finishing a pass', async () => {
    const executor = new DeferredExecutor();
    const pending = refineParallel(fill(problemNamed('gentle-ledger').grid), executor);
    expect(executor.pendingCount).toBe(9);
    let settled = false;
    const done = pending.then(() => {
      settled = true;
    });
    await Promise.resolve();
    expect(settled).toBe(false);
    while (!settled) {
      executor.release('reverse');
      await new Promise<void>((resolve) => {
        setImmediate(() => {
          resolve();
        });
      });
    }
    await done;
    expect(solutionToDigits(await pending)).toEqual(solutionNamed('gentle-ledger'));
  });
});
