/**
 * @broadside/engine
 *
 * Heat-map targeting assistant for Battleship-style games: a generic grid,
 * the placement-density heat engine, the player action model and the game
 * state that applies actions and keeps an undoable history.
 */

export * from './grid/index.js';
export * from './heat/index.js';
export * from './actions/index.js';
export * from './state/index.js';
export {
  InputError,
  GridBoundsError,
  ContractViolationError,
  isRecoverableError,
  cannotInfer,
} from './errors.js';
export type { InputErrorCode } from './errors.js';
export { engineDebug } from './debug.js';
