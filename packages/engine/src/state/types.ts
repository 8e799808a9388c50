import type { ResolvedAction } from '../actions/types.js';
import type { Coordinate } from '../grid/types.js';

export interface BoardConfig {
  width: number;
  height: number;
  /** Lengths of the ships still afloat; duplicates allowed. */
  ships: number[];
}

/**
 * Picks one of several places a sunk ship could be. Receives the candidate
 * cell lists and resolves to a 1-based index into them.
 */
export type SinkLocationResolver = (candidates: Coordinate[][]) => Promise<number>;

export interface GameStateOptions {
  resolveSinkLocation?: SinkLocationResolver;
}

export interface ActionOutcome {
  /** What was actually applied to the board. */
  executed: ResolvedAction;
  /** History entry this call took back, if it was an undo or cancelled one. */
  undone: ResolvedAction | null;
  gameOver: boolean;
}
