/**
 * Hit-constrained density: placements that would explain an existing hit.
 *
 * For every hit and ship length, only the stretch of the hit's row and column
 * within `shipLength - 1` cells of the hit is considered. Each hit is
 * normalized by its own placement count, then the hits are averaged.
 */

import { Grid } from '../grid/grid.js';
import { AXES, getAxisIndex, oppositeAxis } from '../grid/types.js';
import type { Coordinate } from '../grid/types.js';
import { combineIndependent, countsToProbability, emptyHeat } from './combine.js';
import { countLinePlacements, maskAroundHit } from './placements.js';
import type { HeatFieldResult, HeatWarning, ShipCount } from './types.js';

/** Placements of one ship through a single hit, along its row and column. */
export function countHitPlacements(
  open: Grid<boolean>,
  hit: Coordinate,
  shipLength: number
): ShipCount {
  const counts = Grid.filled(open.width(), open.height(), 0);
  let placements = 0;

  for (const axis of AXES) {
    const index = getAxisIndex(hit, axis);
    const masked = maskAroundHit(
      open.getLine(axis, index),
      getAxisIndex(hit, oppositeAxis(axis)),
      shipLength
    );
    const line = countLinePlacements(masked, shipLength);
    counts.mergeLine(axis, index, line.counts, (a, b) => a + b);
    placements += line.placements;
  }

  return { counts, placements };
}

/**
 * Mean over all hits of each hit's placement probability. A hit this ship
 * cannot cover adds nothing but still counts towards the mean.
 */
export function generateHitShipHeat(
  open: Grid<boolean>,
  hits: readonly Coordinate[],
  shipLength: number
): { heat: Grid<number>; placements: number } {
  let heat = emptyHeat(open.width(), open.height());
  let placements = 0;

  for (const hit of hits) {
    const counted = countHitPlacements(open, hit, shipLength);
    if (counted.placements === 0) continue;
    heat = heat.merge(countsToProbability(counted.counts, counted.placements), (a, b) => a + b);
    placements += counted.placements;
  }

  return { heat: heat.transform((value) => value / hits.length), placements };
}

export function generateHitsHeat(
  open: Grid<boolean>,
  hits: readonly Coordinate[],
  shipLengths: readonly number[]
): HeatFieldResult {
  const width = open.width();
  const height = open.height();

  if (hits.length === 0) {
    return { heat: emptyHeat(width, height), warnings: [] };
  }

  let totalPlacements = 0;
  const fields = shipLengths.map((shipLength) => {
    const { heat, placements } = generateHitShipHeat(open, hits, shipLength);
    totalPlacements += placements;
    return heat;
  });

  const warnings: HeatWarning[] =
    totalPlacements === 0 ? [{ kind: 'unexplained-hits', hits: [...hits] }] : [];

  return { heat: combineIndependent(fields, width, height), warnings };
}
