/**
 * Fill in the arguments a player left out, from the current recommendation
 * or the action history:
 *
 *   fire    -> the primary recommended move
 *   hit     -> the target of the last fire
 *   unfire  -> reverses the last fire
 *   unsink  -> reverses the last sink
 *   sink    -> never; a sunk ship's length cannot be inferred
 */

import { fire, hit, isResolved, oppositeAction, sink } from '../actions/action.js';
import type { Action } from '../actions/types.js';
import { cannotInfer, ContractViolationError } from '../errors.js';
import type { GameState } from './game-state.js';

export function inferArguments(action: Action, state: GameState): Action {
  if (action.kind === 'undo' || isResolved(action)) return action;

  switch (action.kind) {
    case 'fire':
      return fire(state.getRecommendedMove());
    case 'hit': {
      const lastFire = state.getLastMatchingAction(fire());
      if (lastFire.kind !== 'fire') {
        throw new ContractViolationError(`History returned '${lastFire.kind}' for the last 'fire'.`);
      }
      return hit(lastFire.target);
    }
    case 'unfire':
      return oppositeAction(state.getLastMatchingAction(fire()));
    case 'unsink':
      return oppositeAction(state.getLastMatchingAction(sink()));
    case 'sink':
      throw cannotInfer();
  }
}
