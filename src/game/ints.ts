// Functions for checking the integers handed to the engine.

import {InvalidInputError} from './errors';

/**
 * Tells whether a value is an integer in a given range.
 *
 * @param n The value to check.
 * @param lo The lower bound, inclusive.
 * @param hi The upper bound, exclusive.
 */
export function isIntInRange(n: unknown, lo: number, hi: number): n is number {
  return typeof n === 'number' && Number.isInteger(n) && n >= lo && n < hi;
}

/**
 * Ensures that a given number is an integer.
 *
 * @returns `n`, if it is an integer.
 * @throws InvalidInputError if `n` is not an integer.
 */
export function checkInt(n: number): number {
  if (!Number.isInteger(n)) {
    throw new InvalidInputError(`${n} is not an integer`);
  }
  return n;
}

/**
 * Ensures that a given number is an integer in a given range.
 *
 * @param n The number to check.
 * @param lo The lower bound, inclusive.
 * @param hi The upper bound, exclusive.
 * @returns `n`, if it is an integer in the given range.
 * @throws InvalidInputError if `n` is not an integer or outside the range.
 */
export function checkIntRange(n: number, lo: number, hi: number): number {
  checkInt(n);
  if (n < lo || n >= hi) {
    throw new InvalidInputError(`${n} out of range ${lo}..${hi}`);
  }
  return n;
}

/**
 * Ensures that a number is a Sudoku numeral, 1..=9.
 */
export function checkNum(num: number): number {
  return checkIntRange(num, 1, 10);
}
