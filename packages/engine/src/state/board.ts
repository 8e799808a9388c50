/**
 * Board queries used by Game State: recommendations and sink candidates.
 */

import type { Grid } from '../grid/grid.js';
import { AXES, oppositeAxis, withAxisIndex } from '../grid/types.js';
import type { Coordinate, ShotStatus } from '../grid/types.js';

/** Heat values this close to the maximum count as tied. */
export const TOP_MOVE_TOLERANCE = 1e-9;

/**
 * Untested cells holding the maximum heat, in row-major order. The first one
 * is the primary recommendation. Empty once nothing is left untested.
 */
export function findTopMoves(heat: Grid<number>, shots: Grid<ShotStatus>): Coordinate[] {
  const candidates = shots.findAll((status) => status === 'untested');
  if (candidates.length === 0) return [];

  const best = Math.max(...candidates.map((coord) => heat.getValue(coord)));
  return candidates.filter((coord) => Math.abs(heat.getValue(coord) - best) <= TOP_MOVE_TOLERANCE);
}

/**
 * Every run of `length` consecutive hit cells along either axis. A longer run
 * yields one candidate per window; a cell set found along both axes (ships of
 * length 1) is listed once.
 */
export function findSinkLocations(shots: Grid<ShotStatus>, length: number): Coordinate[][] {
  const locations: Coordinate[][] = [];
  const seen = new Set<string>();

  for (const axis of AXES) {
    for (let index = 0; index < shots.numberOfLines(axis); index++) {
      const line = shots.getLine(axis, index);
      for (let start = 0; start + length <= line.length; start++) {
        if (!line.slice(start, start + length).every((status) => status === 'hit')) continue;

        const origin = withAxisIndex({ row: 0, column: 0 }, axis, index);
        const cells = Array.from({ length }, (_, offset) =>
          withAxisIndex(origin, oppositeAxis(axis), start + offset)
        );
        const key = cells.map((c) => `${c.row},${c.column}`).join(';');
        if (seen.has(key)) continue;
        seen.add(key);
        locations.push(cells);
      }
    }
  }

  return locations;
}
