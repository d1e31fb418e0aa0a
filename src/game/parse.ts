/*
 * Turns the flat text form of a puzzle into grid values: any digit 1-9 is a
 * clue, newlines are skipped, and anything else is a blank.
 */

import {InvalidInputError} from './errors';
import {Grid} from './grid';

/**
 * Parses puzzle text into 81 values in row-major order.
 *
 * @throws InvalidInputError if the text doesn't describe exactly 81 cells.
 */
export function parseValues(text: string): Array<number | null> {
  const values = [...text.replace(/[\r\n]/g, '')].map(ch =>
    ch >= '1' && ch <= '9' ? Number(ch) : null,
  );
  if (values.length !== 81) {
    throw new InvalidInputError(
      `Expected 81 cells in puzzle text, got ${values.length}`,
    );
  }
  return values;
}

/**
 * Parses puzzle text into a grid whose numerals are all clues.
 *
 * @throws InvalidInputError if the text doesn't describe exactly 81 cells.
 */
export function parseGrid(text: string): Grid {
  return new Grid(parseValues(text));
}
