/**
 * Action Model
 *
 * The closed set of player moves and their fixed properties: command token,
 * inverse, arity, whether missing arguments can be inferred, and the text
 * shown to the player. Nothing here mutates game state.
 */

import { ContractViolationError } from '../errors.js';
import { coordinatesEqual, formatCoordinate } from '../grid/types.js';
import type { Coordinate } from '../grid/types.js';
import type { Action, ActionKind, ResolvedAction } from './types.js';

/** Every kind, in the order commands are listed to the player. */
export const ACTION_KINDS: readonly ActionKind[] = [
  'fire',
  'hit',
  'sink',
  'unfire',
  'unsink',
  'undo',
];

// =============================================================================
// Constructors
// =============================================================================

export function fire(target: Coordinate | null = null): Action {
  return { kind: 'fire', target };
}

export function hit(target: Coordinate | null = null): Action {
  return { kind: 'hit', target };
}

export function unfire(target: Coordinate | null = null): Action {
  return { kind: 'unfire', target };
}

export function sink(length: number | null = null): Action {
  return { kind: 'sink', length, cells: null };
}

export function unsink(length: number | null = null): Action {
  return { kind: 'unsink', length, cells: null };
}

export function undo(): Action {
  return { kind: 'undo' };
}

/** An action of the given kind with every argument still unknown. */
export function blankAction(kind: ActionKind): Action {
  switch (kind) {
    case 'fire':
      return fire();
    case 'hit':
      return hit();
    case 'unfire':
      return unfire();
    case 'sink':
      return sink();
    case 'unsink':
      return unsink();
    case 'undo':
      return undo();
  }
}

// =============================================================================
// Properties
// =============================================================================

/** Stable lowercase command token. */
export function actionName(kind: ActionKind): string {
  return kind;
}

export function expectedArgCount(kind: ActionKind): number {
  switch (kind) {
    case 'fire':
    case 'hit':
    case 'unfire':
      return 2;
    case 'sink':
    case 'unsink':
      return 1;
    case 'undo':
      return 0;
  }
}

/** A sunk ship's length can never be worked out from the board. */
export function canInferArgs(kind: ActionKind): boolean {
  return kind !== 'sink';
}

export function isResolved(action: Action): action is ResolvedAction {
  switch (action.kind) {
    case 'fire':
    case 'hit':
    case 'unfire':
      return action.target !== null;
    case 'sink':
    case 'unsink':
      return action.length !== null;
    case 'undo':
      return false;
  }
}

export function oppositeAction(action: ResolvedAction): ResolvedAction;
export function oppositeAction(action: Action): Action;
export function oppositeAction(action: Action): Action {
  switch (action.kind) {
    case 'fire':
    case 'hit':
      return { kind: 'unfire', target: action.target };
    case 'unfire':
      return { kind: 'fire', target: action.target };
    case 'sink':
      return { kind: 'unsink', length: action.length, cells: copyCells(action.cells) };
    case 'unsink':
      return { kind: 'sink', length: action.length, cells: copyCells(action.cells) };
    case 'undo':
      throw new ContractViolationError("There exists no opposite of 'undo'.");
  }
}

/** Same kind and same primary argument. Recorded sink cells are not compared. */
export function actionsMatch(a: ResolvedAction, b: ResolvedAction): boolean {
  if (a.kind !== b.kind) return false;
  if ('target' in a && 'target' in b) return coordinatesEqual(a.target, b.target);
  if ('length' in a && 'length' in b) return a.length === b.length;
  return false;
}

function copyCells(cells: Coordinate[] | null): Coordinate[] | null {
  return cells === null ? null : cells.map((cell) => ({ ...cell }));
}

// =============================================================================
// Player-facing text
// =============================================================================

export function syntaxHelp(kind: ActionKind): string {
  switch (kind) {
    case 'fire':
      return "'fire <column> <row>' [1-index] Fires at the specified coordinate.\n\tDefault: Executes most recent recommendation.";
    case 'hit':
      return "'hit <column> <row>' [1-index] Marks the specified coordinate as hit.\n\tDefault: Marks the most recently fired at coordinate as hit.";
    case 'sink':
      return "'sink <ship length>' Removes one ship of the specified length from the list.\n\tThe length cannot be inferred.";
    case 'unfire':
      return "'unfire <column> <row>' [1-index] Removes the specified firing marker.\n\tDefault: Undoes most recent fire command.";
    case 'unsink':
      return "'unsink <ship length>' Adds one ship of the specified length to the list.\n\tDefault: Undoes the most recent sink command.";
    case 'undo':
      return "'undo' Undoes the most recent action.";
  }
}

/**
 * Report for an executed action. An undo reports the action it turned into,
 * so asking for one here is a caller bug.
 */
export function successMessage(action: Action): string {
  if (action.kind === 'undo') {
    throw new ContractViolationError(
      'An undo reports the success message of the action it executed.'
    );
  }
  if (!isResolved(action)) {
    throw new ContractViolationError(
      `'${action.kind}' has unknown arguments and cannot have been executed.`
    );
  }
  switch (action.kind) {
    case 'fire':
      return `Fired at ${formatCoordinate(action.target)}.`;
    case 'hit':
      return `Set hit marker at ${formatCoordinate(action.target)}.`;
    case 'unfire':
      return `Removed fire marker at ${formatCoordinate(action.target)}.`;
    case 'sink':
      return `Sunk a ship of length ${action.length}.`;
    case 'unsink':
      return `Added a ship of length ${action.length} to the roster.`;
  }
}
