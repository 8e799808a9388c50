export { GameState } from './game-state.js';
export { inferArguments } from './inference.js';
export { findTopMoves, findSinkLocations, TOP_MOVE_TOLERANCE } from './board.js';
export type {
  ActionOutcome,
  BoardConfig,
  GameStateOptions,
  SinkLocationResolver,
} from './types.js';
