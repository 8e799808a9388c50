/**
 * Heat field
 *
 * Per-cell likelihood that an untested cell holds a ship, from the shot grid
 * and the remaining ship lengths. Recomputed from scratch on every call.
 */

import type { Grid } from '../grid/grid.js';
import { canContainShip, formatCoordinate } from '../grid/types.js';
import type { ShotStatus } from '../grid/types.js';
import { generateBasicHeat } from './basic.js';
import { combineIndependent, maskResolvedCells } from './combine.js';
import { generateHitsHeat } from './hits.js';
import type { HeatFieldResult, HeatWarning } from './types.js';

export function generateHeatField(
  shots: Grid<ShotStatus>,
  shipLengths: readonly number[]
): HeatFieldResult {
  const open = shots.transform(canContainShip);
  const hits = shots.findAll((status) => status === 'hit');

  const basic = generateBasicHeat(open, shipLengths);
  const fromHits = generateHitsHeat(open, hits, shipLengths);

  const combined = combineIndependent(
    [basic.heat, fromHits.heat],
    shots.width(),
    shots.height()
  );

  return {
    heat: maskResolvedCells(combined, shots),
    warnings: [...basic.warnings, ...fromHits.warnings],
  };
}

export function describeHeatWarning(warning: HeatWarning): string {
  switch (warning.kind) {
    case 'unplaceable-ship':
      return `Ship of length ${warning.shipLength} couldn't be placed a single time.`;
    case 'unexplained-hits':
      return `No ship fits the given hit(s): ${warning.hits.map(formatCoordinate).join('')}.`;
  }
}
