export * from './game/errors';
export {Grid, type Cell, type ReadonlyGrid} from './game/grid';
export {Loc} from './game/loc';
export {parseGrid, parseValues} from './game/parse';
export {
  countSolutions,
  solve,
  Solver,
  type SolverOptions,
  type SolveStep,
  type SolveSteps,
  SolveStepType,
} from './game/solver';
export {Sudoku} from './game/sudoku';
export type {GridString, GridValues} from './game/types';
export {EventType, logEvent, setEventSink} from './system/analytics';
export {
  MemoryPuzzleStore,
  JsonPuzzleStore,
  type PuzzleStore,
} from './system/puzzle-store';
export {PuzzleService, type SolvedPuzzle} from './system/puzzle-service';
