import type {
  Grid,
  GridOutcome
} from './Grid.ts';

import {
  ALL_DIGITS,
  isContradiction
} from './Cell.ts';
import {
  toBlockView,
  transpose
} from './Grid.ts';
import { InvalidSolutionError } from './InvalidSolutionError.ts';

export function assertValidSolution(solution: GridOutcome): void {
  if (isContradiction(solution) || validSolution(solution)) {
    return;
  }
  throw new InvalidSolutionError(solution);
}

/**
 * A contradiction counts as valid: "no solution" is a legitimate answer.
 * A grid is valid when every row, column and block holds exactly the digits 1..9.
 */
export function validSolution(solution: GridOutcome): boolean {
  if (isContradiction(solution)) {
    return true;
  }
  return validHouses(solution) && validHouses(transpose(solution)) && validHouses(toBlockView(solution));
}

function validHouses(houses: Grid): boolean {
  return houses.every((house) => {
    const values = house.map((cell) => cell.kind === 'fixed' ? cell.value : 0).sort((a, b) => a - b);
    return values.length === ALL_DIGITS.length && values.every((value, index) => value === ALL_DIGITS[index]);
  });
}
