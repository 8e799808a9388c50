/**
 * One round of play: parse, infer missing arguments, apply, report.
 */

import {
  inferArguments,
  isRecoverableError,
  successMessage,
} from '@broadside/engine';
import type { Action, ActionOutcome, GameState } from '@broadside/engine';
import { parseCommand } from './commands.js';

export interface CommandResult {
  ok: boolean;
  message: string;
}

export function describeOutcome(requested: Action, outcome: ActionOutcome): string {
  const lines: string[] = [];
  if (requested.kind === 'undo' && outcome.undone) {
    lines.push(`Successfully undid '${outcome.undone.kind}'.`);
  }
  lines.push(successMessage(outcome.executed));
  if (outcome.gameOver) {
    lines.push('Game is over, every ship has been sunk.');
  }
  return lines.join('\n');
}

export async function playRound(state: GameState, input: string): Promise<string> {
  const action = inferArguments(parseCommand(input), state);
  const outcome = await state.takeAction(action);
  return describeOutcome(action, outcome);
}

/** Like playRound, but player mistakes come back as a failed result. */
export async function runCommand(state: GameState, input: string): Promise<CommandResult> {
  try {
    return { ok: true, message: await playRound(state, input) };
  } catch (err) {
    if (isRecoverableError(err)) {
      return { ok: false, message: err.message };
    }
    throw err;
  }
}
