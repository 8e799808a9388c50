/**
 * Grid
 *
 * Fixed-size two-dimensional container addressed by {row, column}. Line access
 * is parameterized by axis so row and column logic is written once.
 * transform and merge always build a new grid; inputs are never mutated.
 */

import { ContractViolationError, GridBoundsError } from '../errors.js';
import type { Axis, Coordinate } from './types.js';

export class Grid<T> {
  private readonly data: T[][];

  private constructor(data: T[][]) {
    this.data = data;
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  static generate<T>(
    width: number,
    height: number,
    init: (coord: Coordinate) => T
  ): Grid<T> {
    assertDimension('width', width);
    assertDimension('height', height);
    const data = Array.from({ length: height }, (_, row) =>
      Array.from({ length: width }, (_, column) => init({ row, column }))
    );
    return new Grid(data);
  }

  static filled<T>(width: number, height: number, value: T): Grid<T> {
    return Grid.generate(width, height, () => value);
  }

  /** Build from explicit rows. Every row must have the same, non-zero length. */
  static fromRows<T>(rows: readonly (readonly T[])[]): Grid<T> {
    if (rows.length === 0) {
      throw new RangeError('Grid needs at least one row');
    }
    const width = rows[0].length;
    assertDimension('width', width);
    for (const row of rows) {
      if (row.length !== width) {
        throw new RangeError(`Ragged grid: expected rows of length ${width}, got ${row.length}`);
      }
    }
    return new Grid(rows.map((row) => [...row]));
  }

  // ===========================================================================
  // Dimensions
  // ===========================================================================

  width(): number {
    return this.data[0].length;
  }

  height(): number {
    return this.data.length;
  }

  /** Number of cells in a single line along `axis`. */
  lengthOfAxis(axis: Axis): number {
    return axis === 'row' ? this.width() : this.height();
  }

  /** Number of distinct lines along `axis`. */
  numberOfLines(axis: Axis): number {
    return axis === 'row' ? this.height() : this.width();
  }

  // ===========================================================================
  // Cell access
  // ===========================================================================

  getValue(coord: Coordinate): T {
    this.checkIndex('row', coord.row);
    this.checkIndex('column', coord.column);
    return this.data[coord.row][coord.column];
  }

  setValue(coord: Coordinate, value: T): void {
    this.checkIndex('row', coord.row);
    this.checkIndex('column', coord.column);
    this.data[coord.row][coord.column] = value;
  }

  // ===========================================================================
  // Line access
  // ===========================================================================

  getLine(axis: Axis, index: number): T[] {
    this.checkIndex(axis, index);
    if (axis === 'row') {
      return [...this.data[index]];
    }
    return this.data.map((row) => row[index]);
  }

  setLine(axis: Axis, index: number, line: readonly T[]): void {
    this.checkIndex(axis, index);
    if (line.length !== this.lengthOfAxis(axis)) {
      throw new ContractViolationError(
        `Line of length ${line.length} does not fit a ${axis} of length ${this.lengthOfAxis(axis)}`
      );
    }
    if (axis === 'row') {
      this.data[index] = [...line];
      return;
    }
    this.data.forEach((row, rowIndex) => {
      row[index] = line[rowIndex];
    });
  }

  /** Combine an existing line with `line`, cell by cell, in place. */
  mergeLine<U>(
    axis: Axis,
    index: number,
    line: readonly U[],
    fn: (current: T, incoming: U) => T
  ): void {
    const current = this.getLine(axis, index);
    if (line.length !== current.length) {
      throw new ContractViolationError(
        `Line of length ${line.length} does not fit a ${axis} of length ${current.length}`
      );
    }
    this.setLine(
      axis,
      index,
      current.map((value, i) => fn(value, line[i]))
    );
  }

  // ===========================================================================
  // Whole-grid operations
  // ===========================================================================

  transform<U>(fn: (value: T, coord: Coordinate) => U): Grid<U> {
    return new Grid(
      this.data.map((row, rowIndex) =>
        row.map((value, column) => fn(value, { row: rowIndex, column }))
      )
    );
  }

  merge<U, V>(other: Grid<U>, fn: (a: T, b: U) => V): Grid<V> {
    if (other.width() !== this.width() || other.height() !== this.height()) {
      throw new ContractViolationError(
        `Cannot merge a ${other.width()}x${other.height()} grid into a ${this.width()}x${this.height()} grid`
      );
    }
    return this.transform((value, coord) => fn(value, other.getValue(coord)));
  }

  /** Every coordinate whose value satisfies `predicate`, in row-major order. */
  findAll(predicate: (value: T) => boolean): Coordinate[] {
    const found: Coordinate[] = [];
    this.data.forEach((row, rowIndex) => {
      row.forEach((value, column) => {
        if (predicate(value)) found.push({ row: rowIndex, column });
      });
    });
    return found;
  }

  clone(): Grid<T> {
    return new Grid(this.data.map((row) => [...row]));
  }

  /** Copy of the underlying rows, safe to hand to renderers. */
  toRows(): T[][] {
    return this.data.map((row) => [...row]);
  }

  private checkIndex(axis: Axis, index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.numberOfLines(axis)) {
      throw new GridBoundsError(axis);
    }
  }
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`Grid ${name} must be a positive integer, got ${value}`);
  }
}
