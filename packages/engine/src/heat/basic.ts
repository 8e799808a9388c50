/**
 * Unconstrained placement density: how often each open cell is covered by
 * some legal placement of each remaining ship, ignoring hits.
 */

import { Grid } from '../grid/grid.js';
import { AXES } from '../grid/types.js';
import { combineIndependent, countsToProbability, emptyHeat } from './combine.js';
import { countLinePlacements } from './placements.js';
import type { HeatFieldResult, HeatWarning, ShipCount } from './types.js';

export function countShipPlacements(open: Grid<boolean>, shipLength: number): ShipCount {
  const counts = Grid.filled(open.width(), open.height(), 0);
  let placements = 0;

  for (const axis of AXES) {
    for (let index = 0; index < open.numberOfLines(axis); index++) {
      const line = countLinePlacements(open.getLine(axis, index), shipLength);
      counts.mergeLine(axis, index, line.counts, (a, b) => a + b);
      placements += line.placements;
    }
  }

  return { counts, placements };
}

export function generateBasicHeat(
  open: Grid<boolean>,
  shipLengths: readonly number[]
): HeatFieldResult {
  const width = open.width();
  const height = open.height();
  const warnings: HeatWarning[] = [];

  const fields = shipLengths.map((shipLength) => {
    const { counts, placements } = countShipPlacements(open, shipLength);
    if (placements === 0) {
      warnings.push({ kind: 'unplaceable-ship', shipLength });
      return emptyHeat(width, height);
    }
    return countsToProbability(counts, placements);
  });

  return { heat: combineIndependent(fields, width, height), warnings };
}
