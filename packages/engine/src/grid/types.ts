/**
 * Board primitives: axes, coordinates and per-cell shot status.
 */

// =============================================================================
// Axis
// =============================================================================

export type Axis = 'row' | 'column';

export const AXES: readonly Axis[] = ['row', 'column'];

export function oppositeAxis(axis: Axis): Axis {
  return axis === 'row' ? 'column' : 'row';
}

// =============================================================================
// Coordinate
// =============================================================================

/** Zero-indexed board position. */
export interface Coordinate {
  row: number;
  column: number;
}

/**
 * Index of the coordinate along the line selected by `axis`: the row number
 * for 'row', the column number for 'column'.
 */
export function getAxisIndex(coord: Coordinate, axis: Axis): number {
  return axis === 'row' ? coord.row : coord.column;
}

export function withAxisIndex(coord: Coordinate, axis: Axis, index: number): Coordinate {
  return axis === 'row' ? { ...coord, row: index } : { ...coord, column: index };
}

export function coordinatesEqual(a: Coordinate, b: Coordinate): boolean {
  return a.row === b.row && a.column === b.column;
}

/** Players read boards column-first and 1-indexed, like chess. */
export function formatCoordinate(coord: Coordinate): string {
  return `[${coord.column + 1}, ${coord.row + 1}]`;
}

export function coordinateFromUser(column: number, row: number): Coordinate {
  return { row: row - 1, column: column - 1 };
}

// =============================================================================
// Shot status
// =============================================================================

export type ShotStatus = 'untested' | 'miss' | 'hit' | 'sunk';

/** Misses and sunk cells can never hold an undiscovered ship segment. */
export function canContainShip(status: ShotStatus): boolean {
  return status === 'untested' || status === 'hit';
}
