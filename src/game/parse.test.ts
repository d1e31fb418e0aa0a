import {InvalidInputError} from './errors';
import {Loc} from './loc';
import {parseGrid, parseValues} from './parse';

describe(`parse module`, () => {
  it(`treats digits 1-9 as clues and anything else as a blank`, () => {
    const values = parseValues(`1x.0 ${'9'.repeat(76)}`);
    expect(values.slice(0, 6)).toEqual([1, null, null, null, null, 9]);
  });

  it(`skips newlines`, () => {
    const rows = Array.from({length: 9}, (_, row) =>
      row === 4 ? '....5....' : '.........',
    );
    const grid = parseGrid(`${rows.join('\r\n')}\n`);
    expect(grid.get(Loc.of(4, 4))).toBe(5);
    expect(grid.isFixed(Loc.of(4, 4))).toBe(true);
    expect(grid.getAssignedCount()).toBe(1);
  });

  it(`needs exactly 81 cells`, () => {
    expect(() => parseValues('.'.repeat(80))).toThrow(InvalidInputError);
    expect(() => parseValues('.'.repeat(82))).toThrow(
      'Expected 81 cells in puzzle text, got 82',
    );
  });
});
