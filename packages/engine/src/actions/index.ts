export {
  ACTION_KINDS,
  fire,
  hit,
  unfire,
  sink,
  unsink,
  undo,
  blankAction,
  actionName,
  expectedArgCount,
  canInferArgs,
  isResolved,
  oppositeAction,
  actionsMatch,
  syntaxHelp,
  successMessage,
} from './action.js';
export type {
  Action,
  ActionKind,
  ActionOf,
  CoordinateActionKind,
  LengthActionKind,
  ResolvedAction,
  UndoAction,
} from './types.js';
