import { Grid } from '../grid/grid.js';
import type { ShotStatus } from '../grid/types.js';

export function emptyHeat(width: number, height: number): Grid<number> {
  return Grid.filled(width, height, 0);
}

export function countsToProbability(counts: Grid<number>, placements: number): Grid<number> {
  return counts.transform((count) => count / placements);
}

/**
 * Treat each field as an independent event and combine them:
 * P(any) = 1 - Π(1 - Pᵢ). No fields yields an all-zero grid.
 */
export function combineIndependent(
  fields: readonly Grid<number>[],
  width: number,
  height: number
): Grid<number> {
  const absent = fields.reduce(
    (acc, field) => acc.merge(field, (accValue, value) => accValue * (1 - value)),
    Grid.filled(width, height, 1)
  );
  return absent.transform((value) => 1 - value);
}

/** Anything already resolved carries no heat. */
export function maskResolvedCells(heat: Grid<number>, shots: Grid<ShotStatus>): Grid<number> {
  return heat.merge(shots, (value, status) => (status === 'untested' ? value : 0));
}
