export { Grid } from './grid.js';
export type { Axis, Coordinate, ShotStatus } from './types.js';
export {
  AXES,
  oppositeAxis,
  getAxisIndex,
  withAxisIndex,
  coordinatesEqual,
  formatCoordinate,
  coordinateFromUser,
  canContainShip,
} from './types.js';
