import {InvalidInputError} from '../game/errors';
import {readJsonFile} from './files';

/**
 * Resolves puzzle identifiers to the flat text of the puzzles' clues.
 */
export interface PuzzleStore {
  /**
   * Returns the clues text of the puzzle with the given ID, or undefined if
   * the store doesn't have it.
   */
  lookup(puzzleId: string): Promise<string | undefined>;
}

/** A puzzle store backed by a map, mostly for tests. */
export class MemoryPuzzleStore implements PuzzleStore {
  private readonly puzzles: Map<string, string>;

  constructor(puzzles: Record<string, string> = {}) {
    this.puzzles = new Map(Object.entries(puzzles));
  }

  async lookup(puzzleId: string): Promise<string | undefined> {
    return this.puzzles.get(puzzleId);
  }
}

/**
 * A puzzle store backed by a JSON file holding an object that maps puzzle IDs
 * to clues text.  The file is read once, on the first lookup; a failed read
 * is tried again on the next one.
 */
export class JsonPuzzleStore implements PuzzleStore {
  private puzzles?: Promise<Map<string, string>>;

  constructor(readonly file: string) {}

  async lookup(puzzleId: string): Promise<string | undefined> {
    this.puzzles ??= this.load().catch((e: unknown) => {
      this.puzzles = undefined;
      throw e;
    });
    return (await this.puzzles).get(puzzleId);
  }

  private async load(): Promise<Map<string, string>> {
    const parsed = await readJsonFile(this.file);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new InvalidInputError(`${this.file} does not hold a JSON object`);
    }
    const puzzles = new Map<string, string>();
    for (const [puzzleId, clues] of Object.entries(parsed)) {
      if (typeof clues !== 'string') {
        throw new InvalidInputError(
          `Puzzle ${puzzleId} in ${this.file} is not a string`,
        );
      }
      puzzles.set(puzzleId, clues);
    }
    return puzzles;
  }
}
