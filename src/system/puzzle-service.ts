import {performance} from 'perf_hooks';
import {PuzzleNotFoundError} from '../game/errors';
import type {Grid} from '../game/grid';
import {parseGrid} from '../game/parse';
import {Sudoku} from '../game/sudoku';
import {EventType, logEvent} from './analytics';
import {getPuzzlesFile} from './prefs';
import {JsonPuzzleStore, type PuzzleStore} from './puzzle-store';

/** The outcome of solving a puzzle looked up by ID. */
export interface SolvedPuzzle {
  readonly puzzleId: string;
  /** The puzzle with up to two of its solutions. */
  readonly sudoku: Sudoku;
  /** How long solving took, in milliseconds. */
  readonly elapsedMs: number;
}

/**
 * Loads puzzles by ID from a store and solves them.  Stored puzzles are not
 * trusted to be proper: every solve looks for a second solution.
 */
export class PuzzleService {
  constructor(private readonly store: PuzzleStore) {}

  /**
   * Looks up the puzzle with the given ID and parses its clues.
   *
   * @throws PuzzleNotFoundError if the store has no such puzzle.
   * @throws InvalidInputError if the stored clues are malformed.
   */
  async loadById(puzzleId: string): Promise<Grid> {
    const clues = await this.store.lookup(puzzleId);
    if (clues === undefined) {
      logEvent(EventType.ERROR, {
        category: 'puzzle lookup miss',
        detail: puzzleId,
      });
      throw new PuzzleNotFoundError(puzzleId);
    }
    return parseGrid(clues);
  }

  /**
   * Looks up the puzzle with the given ID and solves it.
   */
  async solveById(puzzleId: string): Promise<SolvedPuzzle> {
    const clues = await this.loadById(puzzleId);
    const startTimeMs = performance.now();
    const sudoku = Sudoku.solve(clues);
    const elapsedMs = performance.now() - startTimeMs;
    logEvent(EventType.SYSTEM, {
      category: 'puzzle solve time',
      detail: puzzleId,
      elapsedMs,
    });
    if (!sudoku.isUnique) {
      logEvent(EventType.ERROR, {
        category: sudoku.isSolvable
          ? 'stored puzzle has multiple solutions'
          : 'stored puzzle has no solution',
        detail: `${puzzleId}: ${sudoku.cluesString()}`,
      });
    }
    return {puzzleId, sudoku, elapsedMs};
  }
}

/** Returns a service over the puzzle file named in the prefs. */
export function defaultPuzzleService(): PuzzleService {
  return new PuzzleService(new JsonPuzzleStore(getPuzzlesFile()));
}
