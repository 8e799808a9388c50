/**
 * Grid Tests
 */

import { describe, it, expect } from 'vitest';
import { Grid } from './grid.js';
import { GridBoundsError } from '../errors.js';
import {
  coordinateFromUser,
  formatCoordinate,
  getAxisIndex,
  oppositeAxis,
  withAxisIndex,
  canContainShip,
} from './types.js';

function numbered(): Grid<number> {
  // 3 wide, 2 high:
  // 0 1 2
  // 3 4 5
  return Grid.generate(3, 2, ({ row, column }) => row * 3 + column);
}

describe('Grid construction', () => {
  it('reports fixed dimensions', () => {
    const grid = Grid.filled(9, 7, 'untested');
    expect(grid.width()).toBe(9);
    expect(grid.height()).toBe(7);
    expect(grid.lengthOfAxis('row')).toBe(9);
    expect(grid.lengthOfAxis('column')).toBe(7);
    expect(grid.numberOfLines('row')).toBe(7);
    expect(grid.numberOfLines('column')).toBe(9);
  });

  it('rejects ragged rows', () => {
    expect(() => Grid.fromRows([[1, 2], [3]])).toThrow(RangeError);
  });

  it('rejects empty dimensions', () => {
    expect(() => Grid.filled(0, 3, false)).toThrow(RangeError);
    expect(() => Grid.fromRows([])).toThrow(RangeError);
  });

  it('copies rows passed to fromRows', () => {
    const rows = [[1, 2]];
    const grid = Grid.fromRows(rows);
    rows[0][0] = 99;
    expect(grid.getValue({ row: 0, column: 0 })).toBe(1);
  });
});

describe('Grid cell access', () => {
  it('gets and sets single cells', () => {
    const grid = numbered();
    grid.setValue({ row: 1, column: 2 }, 42);
    expect(grid.getValue({ row: 1, column: 2 })).toBe(42);
    expect(grid.getValue({ row: 0, column: 2 })).toBe(2);
  });

  it('names the row axis when the row is out of range', () => {
    const grid = numbered();
    expect(() => grid.getValue({ row: 2, column: 0 })).toThrow('Row index out of bounds.');
  });

  it('names the column axis when the column is out of range', () => {
    const grid = numbered();
    expect(() => grid.setValue({ row: 0, column: 3 }, 1)).toThrow(GridBoundsError);
    expect(() => grid.setValue({ row: 0, column: -1 }, 1)).toThrow(
      'Column index out of bounds.'
    );
  });
});

describe('Grid line access', () => {
  it('reads rows and columns', () => {
    const grid = numbered();
    expect(grid.getLine('row', 1)).toEqual([3, 4, 5]);
    expect(grid.getLine('column', 2)).toEqual([2, 5]);
  });

  it('replaces a column', () => {
    const grid = numbered();
    grid.setLine('column', 0, [10, 20]);
    expect(grid.toRows()).toEqual([
      [10, 1, 2],
      [20, 4, 5],
    ]);
  });

  it('merges into a row in place', () => {
    const grid = numbered();
    grid.mergeLine('row', 0, [1, 1, 1], (a, b) => a + b);
    expect(grid.getLine('row', 0)).toEqual([1, 2, 3]);
  });

  it('returned lines do not alias the grid', () => {
    const grid = numbered();
    const line = grid.getLine('row', 0);
    line[0] = 100;
    expect(grid.getValue({ row: 0, column: 0 })).toBe(0);
  });

  it('rejects out-of-range line indices', () => {
    expect(() => numbered().getLine('column', 3)).toThrow('Column index out of bounds.');
  });
});

describe('Grid transform and merge', () => {
  it('round-trips through inverse transforms', () => {
    const grid = numbered();
    const back = grid.transform((v) => v * 2 + 1).transform((v) => (v - 1) / 2);
    expect(back.toRows()).toEqual(grid.toRows());
  });

  it('may change the value type without touching the input', () => {
    const grid = numbered();
    const even = grid.transform((v) => v % 2 === 0);
    expect(even.getLine('row', 0)).toEqual([true, false, true]);
    expect(grid.getLine('row', 0)).toEqual([0, 1, 2]);
  });

  it('merge is commutative for commutative functions', () => {
    const a = numbered();
    const b = Grid.generate(3, 2, ({ column }) => column * 10);
    const ab = a.merge(b, (x, y) => x + y);
    const ba = b.merge(a, (x, y) => x + y);
    expect(ab.toRows()).toEqual(ba.toRows());
  });

  it('merging a grid with itself under max is the identity', () => {
    const grid = numbered();
    expect(grid.merge(grid, Math.max).toRows()).toEqual(grid.toRows());
  });

  it('refuses to merge grids of different shapes', () => {
    expect(() => numbered().merge(Grid.filled(2, 2, 0), (a, b) => a + b)).toThrow();
  });

  it('finds coordinates in row-major order', () => {
    const grid = numbered();
    expect(grid.findAll((v) => v % 2 === 1)).toEqual([
      { row: 0, column: 1 },
      { row: 1, column: 0 },
      { row: 1, column: 2 },
    ]);
  });
});

describe('board primitives', () => {
  it('opposite axis is an involution', () => {
    expect(oppositeAxis('row')).toBe('column');
    expect(oppositeAxis(oppositeAxis('row'))).toBe('row');
  });

  it('reads and writes axis indices', () => {
    const coord = { row: 2, column: 5 };
    expect(getAxisIndex(coord, 'row')).toBe(2);
    expect(getAxisIndex(coord, 'column')).toBe(5);
    expect(withAxisIndex(coord, 'column', 0)).toEqual({ row: 2, column: 0 });
  });

  it('converts between user and internal coordinates', () => {
    const coord = coordinateFromUser(4, 2);
    expect(coord).toEqual({ row: 1, column: 3 });
    expect(formatCoordinate(coord)).toBe('[4, 2]');
  });

  it('only untested and hit cells can contain a ship', () => {
    expect(canContainShip('untested')).toBe(true);
    expect(canContainShip('hit')).toBe(true);
    expect(canContainShip('miss')).toBe(false);
    expect(canContainShip('sunk')).toBe(false);
  });
});
