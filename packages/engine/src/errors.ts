/**
 * Error taxonomy shared by the engine and its collaborators.
 *
 * - InputError: the player can fix it by issuing a different command.
 * - GridBoundsError: a coordinate fell outside the board.
 * - ContractViolationError: a caller broke the engine's contract. Never caught.
 */

import type { Axis } from './grid/types.js';

export type InputErrorCode =
  | 'UNPARSABLE_COMMAND'
  | 'UNKNOWN_COMMAND'
  | 'WRONG_ARG_COUNT'
  | 'CANNOT_INFER'
  | 'INVALID_NUMBER'
  | 'NO_MORE_ACTIONS'
  | 'NO_MATCHING_ACTION'
  | 'NO_RECOMMENDATION'
  | 'SHIP_NOT_FOUND'
  | 'SHIP_DOES_NOT_FIT'
  | 'AMBIGUOUS_SINK'
  | 'GAME_OVER';

/**
 * Error thrown for user-correctable input
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly code: InputErrorCode
  ) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * Error thrown when a coordinate or line index lies outside the grid
 */
export class GridBoundsError extends Error {
  constructor(public readonly axis: Axis) {
    super(`${axis === 'row' ? 'Row' : 'Column'} index out of bounds.`);
    this.name = 'GridBoundsError';
  }
}

/**
 * Error thrown when a caller breaks the engine's contract (a bug, not bad input)
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}

export function isRecoverableError(err: unknown): err is InputError | GridBoundsError {
  return err instanceof InputError || err instanceof GridBoundsError;
}

// Pre-built errors for common cases

export function noMoreActions() {
  return new InputError('No more actions to undo.', 'NO_MORE_ACTIONS');
}

export function noMatchingAction(name: string) {
  return new InputError(
    `Could not find last instance of '${name}' in history.`,
    'NO_MATCHING_ACTION'
  );
}

export function noRecommendation() {
  return new InputError('No recommended move available.', 'NO_RECOMMENDATION');
}

export function shipNotFound(length: number) {
  return new InputError(`Ship of length ${length} not found.`, 'SHIP_NOT_FOUND');
}

export function shipDoesNotFit(length: number) {
  return new InputError(
    `Ship of length ${length} doesn't fit existing hits.`,
    'SHIP_DOES_NOT_FIT'
  );
}

export function ambiguousSink(candidates: number) {
  return new InputError(
    `The ship could be in ${candidates} places and no one was asked to choose.`,
    'AMBIGUOUS_SINK'
  );
}

export function gameOver() {
  return new InputError('Game is over.', 'GAME_OVER');
}

export function cannotInfer() {
  return new InputError(
    "No arguments provided. Can't infer arguments for this action.",
    'CANNOT_INFER'
  );
}
