import {
  ConstraintViolationError,
  InvalidInputError,
  InvalidOperationError,
} from './errors';
import {checkNum, isIntInRange} from './ints';
import {Loc} from './loc';
import type {GridString, GridValues} from './types';

/** The bitmask with a bit set for each of the numerals 1..=9. */
export const ALL_NUMS_MASK = 0b11_1111_1110;

/** Returns the numerals whose bits are set in a mask, in ascending order. */
export function numsOfMask(mask: number): number[] {
  const nums = [];
  for (let num = 1; num <= 9; ++num) {
    if (mask & (1 << num)) nums.push(num);
  }
  return nums;
}

/** Counts the bits set in a numeral mask. */
export function countMask(mask: number): number {
  let count = 0;
  for (let m = mask; m; m &= m - 1) ++count;
  return count;
}

/** A read-only view of one location in a grid. */
export interface Cell {
  readonly loc: Loc;
  /** The numeral assigned to the location, or null. */
  readonly value: number | null;
  /** The numerals still possible here; empty once `value` is set. */
  readonly candidates: ReadonlySet<number>;
  /** Whether the value is one of the puzzle's clues. */
  readonly fixed: boolean;
}

const BLANK_VALUES: GridValues = Array.from<null>({length: 81}).fill(null);

/**
 * A 9x9 grid of optional numerals in the range 1..=9, some of which are the
 * puzzle's clues.  Tracks which numerals each row, column and box already
 * holds, so candidate queries don't have to scan the grid.
 */
export class Grid {
  // The cells of the grid are either 0, meaning blank, or 1..=9, the numeral.
  private readonly array = new Uint8Array(81);
  // 1 for the locations holding clues.
  private readonly fixed = new Uint8Array(81);
  // Bit n is set when numeral n appears in the unit.
  private readonly rowMasks = new Uint16Array(9);
  private readonly colMasks = new Uint16Array(9);
  private readonly boxMasks = new Uint16Array(9);

  /**
   * Constructs a grid from 81 values in row-major order; every numeral becomes
   * a clue.  Clues that conflict with each other are allowed here, and make the
   * grid invalid.
   *
   * @throws InvalidInputError if there aren't 81 values, or one of them is
   *     neither null nor an integer in 1..=9.
   */
  constructor(values: GridValues = BLANK_VALUES) {
    if (values.length !== 81) {
      throw new InvalidInputError(`Expected 81 cells, got ${values.length}`);
    }
    values.forEach((num, index) => {
      if (num === null) return;
      if (!isIntInRange(num, 1, 10)) {
        throw new InvalidInputError(
          `Numeral ${num} at ${Loc.of(index)} out of range 1..=9`,
        );
      }
      const loc = Loc.of(index);
      this.array[index] = num;
      this.fixed[index] = 1;
      this.addBits(loc, num);
    });
  }

  /** Returns an independent copy of this grid, clues included. */
  clone(): Grid {
    const copy = new Grid();
    copy.array.set(this.array);
    copy.fixed.set(this.fixed);
    copy.rowMasks.set(this.rowMasks);
    copy.colMasks.set(this.colMasks);
    copy.boxMasks.set(this.boxMasks);
    return copy;
  }

  /**
   * Returns this grid's current numeral for the given location, or null.
   */
  get(loc: Loc): number | null {
    return this.array[loc.index] || null;
  }

  /** Tells whether the given location holds a clue. */
  isFixed(loc: Loc): boolean {
    return this.fixed[loc.index] === 1;
  }

  /** Returns a snapshot of the given location's state. */
  cell(loc: Loc): Cell {
    return {
      loc,
      value: this.get(loc),
      candidates: this.candidatesOf(loc),
      fixed: this.isFixed(loc),
    };
  }

  /**
   * Returns the mask of numerals not yet used in the location's row, column
   * or box; 0 if the location already has a numeral.
   */
  candidateMask(loc: Loc): number {
    if (this.array[loc.index]) return 0;
    return ALL_NUMS_MASK & ~this.usedMask(loc);
  }

  /** Returns the numerals that could still go in the given location. */
  candidatesOf(loc: Loc): Set<number> {
    return new Set(numsOfMask(this.candidateMask(loc)));
  }

  /** Returns how many numerals could still go in the given location. */
  candidateCount(loc: Loc): number {
    return countMask(this.candidateMask(loc));
  }

  /**
   * Assigns a numeral to a location.  Setting a clue to its own numeral does
   * nothing.
   *
   * @throws InvalidInputError if `num` isn't in 1..=9.
   * @throws ConstraintViolationError if the location holds a different clue,
   *     or `num` already appears in the location's row, column or box.
   */
  set(loc: Loc, num: number): void {
    checkNum(num);
    const current = this.array[loc.index];
    if (current === num) return;
    if (this.isFixed(loc)) {
      throw new ConstraintViolationError(
        `Can't replace the clue ${current} at ${loc} with ${num}`,
      );
    }
    if (current) this.removeBits(loc, current);
    if (this.usedMask(loc) & (1 << num)) {
      if (current) this.addBits(loc, current);
      throw new ConstraintViolationError(
        `${num} already appears in the row, column or box of ${loc}`,
      );
    }
    this.array[loc.index] = num;
    this.addBits(loc, num);
  }

  /**
   * Clears the numeral at a location.  Clearing a blank location does nothing.
   *
   * @throws InvalidOperationError if the location holds a clue.
   */
  unset(loc: Loc): void {
    if (this.isFixed(loc)) {
      throw new InvalidOperationError(`Can't clear the clue at ${loc}`);
    }
    const current = this.array[loc.index];
    if (!current) return;
    this.removeBits(loc, current);
    this.array[loc.index] = 0;
  }

  /** Returns a read-only view of the array backing the grid. */
  get bytes(): Readonly<Uint8Array> {
    return this.array;
  }

  /** Returns the grid's numerals as 81 values, in row-major order. */
  values(): Array<number | null> {
    return Array.from(this.array, num => num || null);
  }

  /** Returns the number of locations with an assigned numeral. */
  getAssignedCount(): number {
    return this.array.reduce((count, num) => count + Number(!!num), 0);
  }

  /** Tells whether every location has a numeral. */
  isComplete(): boolean {
    return this.array.every(num => num > 0);
  }

  /** Tells whether no unit holds the same numeral twice. */
  isValid(): boolean {
    return Loc.UNITS.every(unit => {
      let seen = 0;
      for (const loc of unit) {
        const bit = (1 << this.array[loc.index]) & ALL_NUMS_MASK;
        if (seen & bit) return false;
        seen |= bit;
      }
      return true;
    });
  }

  /** Tells whether this grid is a complete, valid Sudoku solution. */
  isSolved(): boolean {
    return this.isComplete() && this.isValid();
  }

  /**
   * Returns the locations whose numerals are repeated in one of their units.
   */
  brokenLocs(): Set<Loc> {
    const broken = new Set<Loc>();
    for (const unit of Loc.UNITS) {
      for (const loc of unit) {
        const num = this.array[loc.index];
        if (!num) continue;
        if (unit.some(o => o !== loc && this.array[o.index] === num)) {
          broken.add(loc);
        }
      }
    }
    return broken;
  }

  /** Tells whether another grid has the same numerals in every location. */
  equals(other: ReadonlyGrid): boolean {
    return this.array.every((num, i) => num === other.bytes[i]);
  }

  /**
   * Returns an ASCII-art version of this grid, with dots for blanks.
   */
  toString(): string {
    const border = '+-------+-------+-------+';
    const lines = [border];
    for (const row of Loc.ROWS) {
      const boxes = [0, 3, 6].map(start =>
        row
          .slice(start, start + 3)
          .map(loc => this.get(loc) ?? '.')
          .join(' '),
      );
      lines.push(`| ${boxes.join(' | ')} |`);
      if (row[0].row % 3 === 2) lines.push(border);
    }
    return lines.join('\n');
  }

  /**
   * Returns an 81-character representation of this grid, with dots for
   * blanks.
   */
  toFlatString(): GridString {
    return this.values()
      .map(num => num ?? '.')
      .join('') as GridString;
  }

  private usedMask(loc: Loc): number {
    return (
      this.rowMasks[loc.row] | this.colMasks[loc.col] | this.boxMasks[loc.box]
    );
  }

  private addBits(loc: Loc, num: number): void {
    const bit = 1 << num;
    this.rowMasks[loc.row] |= bit;
    this.colMasks[loc.col] |= bit;
    this.boxMasks[loc.box] |= bit;
  }

  private removeBits(loc: Loc, num: number): void {
    const bit = ~(1 << num);
    this.rowMasks[loc.row] &= bit;
    this.colMasks[loc.col] &= bit;
    this.boxMasks[loc.box] &= bit;
  }
}

/** A Grid that you can't modify. */
export type ReadonlyGrid = Omit<Grid, 'set' | 'unset'>;
