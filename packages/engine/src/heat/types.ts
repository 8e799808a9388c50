import type { Grid } from '../grid/grid.js';
import type { Coordinate } from '../grid/types.js';

/** Per-cell placement coverage for one line, plus how many placements it holds. */
export interface LineCount {
  counts: number[];
  placements: number;
}

/** Per-cell placement coverage for a whole board and a single ship length. */
export interface ShipCount {
  counts: Grid<number>;
  placements: number;
}

export interface Streak<T> {
  length: number;
  value: T;
}

/**
 * Inconsistencies noticed while building the heat field. They point at a
 * data-entry mistake; the affected contribution is treated as empty.
 */
export type HeatWarning =
  | { kind: 'unplaceable-ship'; shipLength: number }
  | { kind: 'unexplained-hits'; hits: Coordinate[] };

export interface HeatFieldResult {
  heat: Grid<number>;
  warnings: HeatWarning[];
}
