import type {ReadonlyGrid} from './grid';
import {Solver} from './solver';
import type {GridString} from './types';

/**
 * Describes a Sudoku puzzle: its clues, and the solutions found for them.
 */
export class Sudoku {
  constructor(
    readonly clues: ReadonlyGrid,
    readonly solutions: readonly ReadonlyGrid[],
  ) {}

  /**
   * Solves the given clues, looking for a second solution so that the result
   * can tell whether the puzzle is proper.
   */
  static solve(clues: ReadonlyGrid): Sudoku {
    return new Sudoku(clues, new Solver({maxSolutions: 2}).solve(clues));
  }

  /** Tells whether at least one solution was found. */
  get isSolvable(): boolean {
    return this.solutions.length > 0;
  }

  /** Tells whether exactly one solution was found. */
  get isUnique(): boolean {
    return this.solutions.length === 1;
  }

  /** The first solution found, or null. */
  get solution(): ReadonlyGrid | null {
    return this.solutions[0] ?? null;
  }

  /** Returns the clues in GridString form. */
  cluesString(): GridString {
    return this.clues.toFlatString();
  }
}
