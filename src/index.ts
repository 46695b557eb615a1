export {
  benchmark,
  benchmarkBatch,
  benchmarkPuzzles,
  DEFAULT_EXECUTIONS
} from './benchmark.ts';
export type {
  BenchmarkMode,
  PuzzleTiming
} from './benchmark.ts';
export {
  ALL_DIGITS,
  candidatesCell,
  compareCells,
  CONTRADICTION,
  fixedCell,
  isContradiction,
  isDecided,
  isDigit
} from './Cell.ts';
export type {
  CandidatesCell,
  Cell,
  Contradiction,
  Digit,
  FixedCell
} from './Cell.ts';
export {
  fill,
  refine,
  refineParallel,
  refineRow,
  refineRows
} from './constraints.ts';
export {
  fanOutPuzzles,
  fanOutRows,
  runTasks
} from './coordinator.ts';
export type {
  Task,
  TaskOutcome
} from './coordinator.ts';
export {
  DEFAULT_EXECUTOR,
  ImmediateExecutor
} from './executors.ts';
export type {
  Job,
  TaskExecutor
} from './executors.ts';
export {
  BLOCK_SIZE,
  compareGrids,
  fromBlockView,
  GRID_SIZE,
  gridsEqual,
  replaceCell,
  toBlockView,
  transpose,
  valueAt
} from './Grid.ts';
export type {
  DigitGrid,
  Grid,
  GridOutcome,
  Row,
  RowOutcome
} from './Grid.ts';
export { InvalidSolutionError } from './InvalidSolutionError.ts';
export {
  formatGrid,
  pairSolutions,
  parseGrid,
  parseGridRow,
  solutionToDigits
} from './parsers.ts';
export {
  loadPuzzleCollection,
  parsePuzzleCollection
} from './puzzleFile.ts';
export {
  guess,
  guesses,
  hardness,
  solved,
  solveOne,
  solveRefined
} from './search.ts';
export type { GuessChoice } from './search.ts';
export {
  solve,
  solveAll,
  solveParallel
} from './solver.ts';
export type {
  Puzzle,
  Solution,
  SolvedPuzzle,
  SolveReporter
} from './solver.ts';
export {
  assertValidSolution,
  validSolution
} from './validator.ts';
