export { generateHeatField, describeHeatWarning } from './heat-field.js';
export { generateBasicHeat, countShipPlacements } from './basic.js';
export { generateHitsHeat, generateHitShipHeat, countHitPlacements } from './hits.js';
export { combineIndependent, maskResolvedCells } from './combine.js';
export {
  getStreaks,
  generateFreeSpace,
  countLinePlacements,
  maskAroundHit,
} from './placements.js';
export type { HeatFieldResult, HeatWarning, LineCount, ShipCount, Streak } from './types.js';
