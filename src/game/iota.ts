import {checkInt} from './ints';

/**
 * Returns an array of `n` integers counting up from 0.
 *
 * @param n The exclusive upper bound.
 * @throws InvalidInputError if `n` is not an integer.
 */
export function iota(n: number): number[] {
  return Array.from({length: checkInt(n)}, (_, i) => i);
}
