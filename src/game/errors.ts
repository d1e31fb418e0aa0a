/**
 * The kinds of failure the Sudoku engine reports to its callers.
 */
export enum ErrorKind {
  /** Malformed input: wrong size, or a numeral outside 1..=9. */
  INVALID_INPUT = 'InvalidInput',
  /** An assignment that conflicts with its row, column, or box. */
  CONSTRAINT_VIOLATION = 'ConstraintViolation',
  /** An attempt to clear a clue. */
  INVALID_OPERATION = 'InvalidOperation',
  /** A puzzle identifier that the puzzle store doesn't know. */
  PUZZLE_NOT_FOUND = 'PuzzleNotFound',
}

/** Base class for every error thrown by the engine. */
export abstract class SudokuError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends SudokuError {
  override readonly kind = ErrorKind.INVALID_INPUT;
}

export class ConstraintViolationError extends SudokuError {
  override readonly kind = ErrorKind.CONSTRAINT_VIOLATION;
}

export class InvalidOperationError extends SudokuError {
  override readonly kind = ErrorKind.INVALID_OPERATION;
}

export class PuzzleNotFoundError extends SudokuError {
  override readonly kind = ErrorKind.PUZZLE_NOT_FOUND;

  constructor(readonly puzzleId: string) {
    super(`No puzzle found with ID ${JSON.stringify(puzzleId)}`);
  }
}
