export type Digit = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type Cell = CandidatesCell | Contradiction | FixedCell;

export interface CandidatesCell {
  readonly kind: 'candidates';
  readonly values: readonly Digit[];
}

/**
 * Marks a cell, row or grid that cannot be completed.
 */
export interface Contradiction {
  readonly kind: 'contradiction';
}

export interface FixedCell {
  readonly kind: 'fixed';
  readonly value: Digit;
}

const MIN_DIGIT = 1;
const MAX_DIGIT = 9;

const KIND_ORDER: Record<Cell['kind'], number> = {
  candidates: 2,
  contradiction: 1,
  fixed: 0
};

export const ALL_DIGITS: readonly Digit[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

export const CONTRADICTION: Contradiction = { kind: 'contradiction' };

const FIXED_CELLS: readonly FixedCell[] = ALL_DIGITS.map((value): FixedCell => ({ kind: 'fixed', value }));

export function candidatesCell(values: readonly Digit[]): CandidatesCell {
  if (values.length === 0) {
    throw new Error('Candidates cell needs at least one value');
  }
  return { kind: 'candidates', values };
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  if (a === b) {
    return true;
  }
  switch (a.kind) {
    case 'candidates':
      return b.kind === 'candidates'
        && a.values.length === b.values.length
        && a.values.every((value, index) => value === b.values[index]);
    case 'contradiction':
      return b.kind === 'contradiction';
    case 'fixed':
      return b.kind === 'fixed' && a.value === b.value;
    default: {
      const exhaustive: never = a;
      throw new Error(`Unknown cell kind: ${String(exhaustive)}`);
    }
  }
}

export function cellToString(cell: Cell): string {
  switch (cell.kind) {
    case 'candidates':
      return `{${cell.values.join('')}}`;
    case 'contradiction':
      return '!';
    case 'fixed':
      return String(cell.value);
    default: {
      const exhaustive: never = cell;
      throw new Error(`Unknown cell kind: ${String(exhaustive)}`);
    }
  }
}

/**
 * Total order on cells: fixed digits first by value, then contradictions,
 * then candidate lists compared element by element with a shorter prefix first.
 */
export function compareCells(a: Cell, b: Cell): number {
  if (a.kind === 'fixed' && b.kind === 'fixed') {
    return a.value - b.value;
  }
  if (a.kind === 'candidates' && b.kind === 'candidates') {
    return compareDigitLists(a.values, b.values);
  }
  return KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
}

export function fixedCell(value: Digit): FixedCell {
  return FIXED_CELLS[value - 1] ?? { kind: 'fixed', value };
}

export function isContradiction(value: object): value is Contradiction {
  return 'kind' in value && value.kind === 'contradiction';
}

/**
 * A contradiction counts as decided, so one check covers both a finished
 * grid and a dead end.
 */
export function isDecided(cell: Cell): cell is Contradiction | FixedCell {
  return cell.kind !== 'candidates';
}

export function isDigit(value: number): value is Digit {
  return Number.isInteger(value) && value >= MIN_DIGIT && value <= MAX_DIGIT;
}

function compareDigitLists(a: readonly Digit[], b: readonly Digit[]): number {
  for (const [index, value] of a.entries()) {
    const other = b[index];
    if (other === undefined) {
      return 1;
    }
    if (value !== other) {
      return value - other;
    }
  }
  return a.length - b.length;
}
