import type { Coordinate } from '../grid/types.js';

export type CoordinateActionKind = 'fire' | 'hit' | 'unfire';
export type LengthActionKind = 'sink' | 'unsink';
export type ActionKind = CoordinateActionKind | LengthActionKind | 'undo';

type Known<T, Resolved extends boolean> = Resolved extends true ? T : T | null;

/**
 * A player move. `null` arguments are still to be inferred from context;
 * `Resolved = true` guarantees every argument is known.
 *
 * `cells` on sink/unsink records the cells a sink marked, so its inverse can
 * put them back. A hand-typed unsink has none.
 */
export type ActionOf<Resolved extends boolean> =
  | { kind: 'fire'; target: Known<Coordinate, Resolved> }
  | { kind: 'hit'; target: Known<Coordinate, Resolved> }
  | { kind: 'unfire'; target: Known<Coordinate, Resolved> }
  | { kind: 'sink'; length: Known<number, Resolved>; cells: Coordinate[] | null }
  | { kind: 'unsink'; length: Known<number, Resolved>; cells: Coordinate[] | null };

export type UndoAction = { kind: 'undo' };

export type Action = ActionOf<false> | UndoAction;

/** What the history holds: fully specified and never an undo. */
export type ResolvedAction = ActionOf<true>;
