/**
 * Command parsing: turns a line of player input into an Action. Arguments
 * are 1-indexed, column before row. Omitted arguments stay unknown and are
 * filled in later by inferArguments.
 */

import {
  ACTION_KINDS,
  actionName,
  blankAction,
  canInferArgs,
  cannotInfer,
  ContractViolationError,
  coordinateFromUser,
  expectedArgCount,
  fire,
  hit,
  InputError,
  sink,
  unfire,
  unsink,
} from '@broadside/engine';
import type { Action, ActionKind } from '@broadside/engine';

export function parseCommand(input: string): Action {
  const [word, ...args] = input.trim().split(/\s+/).filter(Boolean);
  if (!word) {
    throw new InputError('Unable to parse command.', 'UNPARSABLE_COMMAND');
  }

  const kind = parseKind(word);

  if (args.length === 0) {
    if (canInferArgs(kind)) return blankAction(kind);
    throw cannotInfer();
  }
  if (args.length !== expectedArgCount(kind)) {
    throw new InputError('Incorrect number of arguments.', 'WRONG_ARG_COUNT');
  }

  switch (kind) {
    case 'fire':
    case 'hit':
    case 'unfire': {
      const target = coordinateFromUser(parseNumber(args[0]), parseNumber(args[1]));
      if (kind === 'fire') return fire(target);
      if (kind === 'hit') return hit(target);
      return unfire(target);
    }
    case 'sink':
      return sink(parseNumber(args[0]));
    case 'unsink':
      return unsink(parseNumber(args[0]));
    case 'undo':
      throw new ContractViolationError('undo takes no arguments and was already handled.');
  }
}

function parseKind(word: string): ActionKind {
  const name = word.toLowerCase();
  const kind = ACTION_KINDS.find((k) => actionName(k) === name);
  if (!kind) {
    throw new InputError('Invalid command.', 'UNKNOWN_COMMAND');
  }
  return kind;
}

export function parseNumber(text: string): number {
  if (!/^\d+$/.test(text)) {
    throw new InputError('Unable to read given numeric value.', 'INVALID_NUMBER');
  }
  return Number(text);
}
