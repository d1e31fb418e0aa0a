import {
  ConstraintViolationError,
  InvalidInputError,
  InvalidOperationError,
} from './errors';
import {countMask, Grid, numsOfMask} from './grid';
import {Loc} from './loc';
import {parseValues} from './parse';

const PUZZLE =
  '.......9..9.7..21...4.9.....1...8...7..42...5..8....748.1....4............9613...';
const SOLUTION =
  '157832496396745218284196753415378962763429185928561374831257649672984531549613827';

function blanks(): Array<number | null> {
  return Array.from<null>({length: 81}).fill(null);
}

describe(`Grid`, () => {
  describe(`constructor`, () => {
    it(`makes every numeral a clue`, () => {
      const grid = new Grid(parseValues(PUZZLE));
      expect(grid.get(Loc.of(0, 7))).toBe(9);
      expect(grid.isFixed(Loc.of(0, 7))).toBe(true);
      expect(grid.get(Loc.of(0, 0))).toBeNull();
      expect(grid.isFixed(Loc.of(0, 0))).toBe(false);
      expect(grid.getAssignedCount()).toBe(23);
    });

    it(`defaults to a blank grid`, () => {
      const grid = new Grid();
      expect(grid.getAssignedCount()).toBe(0);
      expect(grid.candidatesOf(Loc.of(40))).toEqual(
        new Set([1, 2, 3, 4, 5, 6, 7, 8, 9]),
      );
    });

    it(`rejects the wrong number of values`, () => {
      expect(() => new Grid(blanks().slice(1))).toThrow(InvalidInputError);
      expect(() => new Grid([...blanks(), null])).toThrow(
        'Expected 81 cells, got 82',
      );
    });

    it(`rejects numerals out of range`, () => {
      for (const bad of [0, 10, -1, 1.5, NaN]) {
        const values = blanks();
        values[5] = bad;
        expect(() => new Grid(values), String(bad)).toThrow(InvalidInputError);
      }
    });

    it(`accepts conflicting clues but reports them`, () => {
      const values = blanks();
      values[0] = 5;
      values[4] = 5;
      const grid = new Grid(values);
      expect(grid.isValid()).toBe(false);
      expect(grid.brokenLocs()).toEqual(new Set([Loc.of(0), Loc.of(4)]));
    });
  });

  describe(`candidatesOf`, () => {
    const grid = new Grid(parseValues(PUZZLE));

    it(`excludes the numerals of the row, column and box`, () => {
      expect(grid.candidatesOf(Loc.of(0, 0))).toEqual(new Set([1, 2, 3, 5, 6]));
      expect(grid.candidatesOf(Loc.of(0, 1))).toEqual(
        new Set([2, 3, 5, 6, 7, 8]),
      );
      expect(grid.candidatesOf(Loc.of(8, 8))).toEqual(new Set([2, 7, 8]));
      expect(grid.candidateCount(Loc.of(8, 8))).toBe(3);
    });

    it(`is empty for an assigned location`, () => {
      expect(grid.candidatesOf(Loc.of(4, 4)).size).toBe(0);
      expect(grid.cell(Loc.of(4, 4))).toEqual({
        loc: Loc.of(4, 4),
        value: 2,
        candidates: new Set(),
        fixed: true,
      });
    });
  });

  describe(`set and unset`, () => {
    const state = cleanState(() => ({grid: new Grid(parseValues(PUZZLE))}));
    const corner = Loc.of(0, 0);
    const below = Loc.of(1, 0);

    it(`updates the candidates of the neighbors`, () => {
      expect(state.grid.candidatesOf(below)).toEqual(new Set([3, 5, 6]));
      state.grid.set(corner, 5);
      expect(state.grid.get(corner)).toBe(5);
      expect(state.grid.candidatesOf(below)).toEqual(new Set([3, 6]));
      state.grid.unset(corner);
      expect(state.grid.get(corner)).toBeNull();
      expect(state.grid.candidatesOf(below)).toEqual(new Set([3, 5, 6]));
    });

    it(`replaces an assigned numeral`, () => {
      state.grid.set(corner, 5);
      state.grid.set(corner, 3);
      expect(state.grid.candidatesOf(below)).toEqual(new Set([5, 6]));
    });

    it(`refuses a numeral already in a unit`, () => {
      state.grid.set(corner, 5);
      expect(() => state.grid.set(corner, 9)).toThrow(ConstraintViolationError);
      expect(state.grid.get(corner)).toBe(5);
      expect(state.grid.candidatesOf(below)).toEqual(new Set([3, 6]));
    });

    it(`refuses to change a clue`, () => {
      expect(() => state.grid.set(Loc.of(0, 7), 3)).toThrow(
        ConstraintViolationError,
      );
      state.grid.set(Loc.of(0, 7), 9);
      expect(state.grid.get(Loc.of(0, 7))).toBe(9);
    });

    it(`refuses to clear a clue`, () => {
      expect(() => state.grid.unset(Loc.of(0, 7))).toThrow(
        InvalidOperationError,
      );
    });

    it(`ignores clearing a blank location`, () => {
      state.grid.unset(corner);
      expect(state.grid.toFlatString()).toBe(PUZZLE);
    });

    it(`refuses numerals out of range`, () => {
      expect(() => state.grid.set(corner, 0)).toThrow(InvalidInputError);
    });
  });

  describe(`clone`, () => {
    it(`is independent of the original`, () => {
      const grid = new Grid(parseValues(PUZZLE));
      const copy = grid.clone();
      copy.set(Loc.of(0, 0), 1);
      expect(grid.get(Loc.of(0, 0))).toBeNull();
      expect(copy.isFixed(Loc.of(0, 7))).toBe(true);
      expect(copy.isFixed(Loc.of(0, 0))).toBe(false);
      expect(copy.equals(grid)).toBe(false);
      copy.unset(Loc.of(0, 0));
      expect(copy.equals(grid)).toBe(true);
    });
  });

  describe(`completeness and validity`, () => {
    it(`recognizes a solved grid`, () => {
      const grid = new Grid(parseValues(SOLUTION));
      expect(grid.isComplete()).toBe(true);
      expect(grid.isValid()).toBe(true);
      expect(grid.isSolved()).toBe(true);
      expect(grid.brokenLocs().size).toBe(0);
    });

    it(`an incomplete grid is not solved`, () => {
      const grid = new Grid(parseValues(PUZZLE));
      expect(grid.isComplete()).toBe(false);
      expect(grid.isValid()).toBe(true);
      expect(grid.isSolved()).toBe(false);
    });

    it(`a complete grid with a repeat is not solved`, () => {
      const swapped = `${SOLUTION[1]}${SOLUTION[0]}${SOLUTION.slice(2)}`;
      const grid = new Grid(parseValues(swapped));
      expect(grid.isComplete()).toBe(true);
      expect(grid.isSolved()).toBe(false);
    });
  });

  describe(`toString`, () => {
    it(`draws the grid with dots for blanks`, () => {
      expect(new Grid(parseValues(PUZZLE)).toString()).toBe(
        [
          '+-------+-------+-------+',
          '| . . . | . . . | . 9 . |',
          '| . 9 . | 7 . . | 2 1 . |',
          '| . . 4 | . 9 . | . . . |',
          '+-------+-------+-------+',
          '| . 1 . | . . 8 | . . . |',
          '| 7 . . | 4 2 . | . . 5 |',
          '| . . 8 | . . . | . 7 4 |',
          '+-------+-------+-------+',
          '| 8 . 1 | . . . | . 4 . |',
          '| . . . | . . . | . . . |',
          '| . . 9 | 6 1 3 | . . . |',
          '+-------+-------+-------+',
        ].join('\n'),
      );
    });

    it(`round-trips through the flat string`, () => {
      expect(new Grid(parseValues(PUZZLE)).toFlatString()).toBe(PUZZLE);
    });
  });
});

describe(`numeral masks`, () => {
  it(`lists the numerals in ascending order`, () => {
    expect(numsOfMask(0b10_0010_0110)).toEqual([1, 2, 5, 9]);
    expect(numsOfMask(0)).toEqual([]);
  });

  it(`counts the numerals`, () => {
    expect(countMask(0b10_0010_0110)).toBe(4);
    expect(countMask(0b11_1111_1110)).toBe(9);
  });
});

function cleanState<T extends {}>(stateFn: () => T): T {
  const state = {} as unknown as T;
  beforeEach(() => {
    for (const property of Object.getOwnPropertyNames(state)) {
      delete (state as {[key: string]: unknown})[property];
    }
    Object.assign(state, stateFn());
  });
  return state;
}
