/**
 * Game State
 *
 * Owns the shot grid, the remaining ships and the action history. Every
 * successful action is applied atomically, recorded (unless it took an
 * earlier entry back) and followed by a full heat field recomputation.
 *
 * Actions must be awaited one at a time: a sink may wait on the player to
 * pick between several candidate locations.
 */

import { actionsMatch, isResolved, oppositeAction } from '../actions/action.js';
import type { Action, ResolvedAction } from '../actions/types.js';
import { engineDebug } from '../debug.js';
import {
  ambiguousSink,
  ContractViolationError,
  gameOver,
  noMatchingAction,
  noMoreActions,
  noRecommendation,
  shipDoesNotFit,
  shipNotFound,
} from '../errors.js';
import { Grid } from '../grid/grid.js';
import type { Coordinate, ShotStatus } from '../grid/types.js';
import { generateHeatField } from '../heat/heat-field.js';
import type { HeatWarning } from '../heat/types.js';
import { findSinkLocations, findTopMoves } from './board.js';
import type {
  ActionOutcome,
  BoardConfig,
  GameStateOptions,
  SinkLocationResolver,
} from './types.js';

const rejectAmbiguousSink: SinkLocationResolver = async (candidates) => {
  throw ambiguousSink(candidates.length);
};

/**
 * Whether the inverse of `action` leads back to it. A hit is taken back by an
 * unfire, whose own inverse is a fire, so a hit never qualifies.
 */
function isReversible(action: ResolvedAction): boolean {
  return actionsMatch(oppositeAction(oppositeAction(action)), action);
}

export class GameState {
  private readonly shots: Grid<ShotStatus>;
  private readonly ships: number[];
  private readonly history: ResolvedAction[] = [];
  private readonly resolveSinkLocation: SinkLocationResolver;

  private heat: Grid<number>;
  private topMoves: Coordinate[];
  private warnings: HeatWarning[];

  constructor(config: BoardConfig, options: GameStateOptions = {}) {
    for (const length of config.ships) {
      if (!Number.isInteger(length) || length <= 0) {
        throw new RangeError(`Ship lengths must be positive integers, got ${length}`);
      }
    }

    this.shots = Grid.filled<ShotStatus>(config.width, config.height, 'untested');
    this.ships = [...config.ships];
    this.resolveSinkLocation = options.resolveSinkLocation ?? rejectAmbiguousSink;

    const { heat, warnings } = generateHeatField(this.shots, this.ships);
    this.heat = heat;
    this.warnings = warnings;
    this.topMoves = findTopMoves(heat, this.shots);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getShots(): Grid<ShotStatus> {
    return this.shots.clone();
  }

  getHeatField(): Grid<number> {
    return this.heat.clone();
  }

  /** Cells tied for the highest heat; the first is the primary recommendation. */
  getTopMoves(): Coordinate[] {
    return this.topMoves.map((coord) => ({ ...coord }));
  }

  getRecommendedMove(): Coordinate {
    const [first] = this.topMoves;
    if (!first) throw noRecommendation();
    return { ...first };
  }

  getShips(): number[] {
    return [...this.ships];
  }

  getHistory(): ResolvedAction[] {
    return [...this.history];
  }

  /** Inconsistencies found by the latest heat field computation. */
  getWarnings(): HeatWarning[] {
    return [...this.warnings];
  }

  isGameOver(): boolean {
    return this.ships.length === 0;
  }

  getLastAction(): ResolvedAction {
    const last = this.history[this.history.length - 1];
    if (!last) throw noMoreActions();
    return last;
  }

  /** Most recent history entry of the same kind as `template`. */
  getLastMatchingAction(template: Action): ResolvedAction {
    if (template.kind === 'undo') {
      throw new ContractViolationError('The action history never contains an undo.');
    }
    for (let i = this.history.length - 1; i >= 0; i--) {
      if (this.history[i].kind === template.kind) return this.history[i];
    }
    throw noMatchingAction(template.kind);
  }

  // ===========================================================================
  // Actions
  // ===========================================================================

  async takeAction(action: Action): Promise<ActionOutcome> {
    let toExecute: ResolvedAction;
    let undone: ResolvedAction | null = null;

    if (action.kind === 'undo') {
      undone = this.getLastAction();
      toExecute = oppositeAction(undone);
      engineDebug(`undo: reversing '${undone.kind}' with '${toExecute.kind}'`);
    } else {
      if (!isResolved(action)) {
        throw new ContractViolationError(
          `Cannot take '${action.kind}' while its arguments are unknown.`
        );
      }
      const addsToBoard = action.kind === 'fire' || action.kind === 'hit' || action.kind === 'sink';
      if (addsToBoard && this.isGameOver()) {
        throw gameOver();
      }

      const last = this.history[this.history.length - 1];
      if (last && isReversible(last) && actionsMatch(action, oppositeAction(last))) {
        // Taking back the latest entry by hand works like an undo.
        undone = last;
        toExecute = oppositeAction(last);
      } else {
        toExecute = action;
      }
    }

    const executed = await this.execute(toExecute);

    if (undone) {
      this.history.pop();
    } else {
      this.history.push(executed);
    }
    this.update();

    return { executed, undone, gameOver: this.isGameOver() };
  }

  private async execute(action: ResolvedAction): Promise<ResolvedAction> {
    engineDebug('executing', action);

    switch (action.kind) {
      case 'fire':
        this.shots.setValue(action.target, 'miss');
        return action;
      case 'unfire':
        this.shots.setValue(action.target, 'untested');
        return action;
      case 'hit':
        this.shots.setValue(action.target, 'hit');
        return action;
      case 'sink':
        return this.sinkShip(action.length, action.cells);
      case 'unsink':
        return this.unsinkShip(action.length, action.cells);
    }
  }

  private async sinkShip(length: number, recorded: Coordinate[] | null): Promise<ResolvedAction> {
    const position = this.ships.indexOf(length);
    if (position === -1) throw shipNotFound(length);

    const cells = recorded ?? (await this.chooseSinkLocation(length));
    if (!cells.every((cell) => this.shots.getValue(cell) === 'hit')) {
      throw shipDoesNotFit(length);
    }

    for (const cell of cells) {
      this.shots.setValue(cell, 'sunk');
    }
    this.ships.splice(position, 1);

    return { kind: 'sink', length, cells: cells.map((cell) => ({ ...cell })) };
  }

  private unsinkShip(length: number, cells: Coordinate[] | null): ResolvedAction {
    const revert = (cells ?? []).filter((cell) => this.shots.getValue(cell) === 'sunk');
    for (const cell of revert) {
      this.shots.setValue(cell, 'hit');
    }
    this.ships.push(length);

    return { kind: 'unsink', length, cells };
  }

  private async chooseSinkLocation(length: number): Promise<Coordinate[]> {
    const locations = findSinkLocations(this.shots, length);
    if (locations.length === 0) throw shipDoesNotFit(length);
    if (locations.length === 1) return locations[0];

    const choice = await this.resolveSinkLocation(locations);
    if (!Number.isInteger(choice) || choice < 1 || choice > locations.length) {
      throw new ContractViolationError(
        `Sink location choice must be between 1 and ${locations.length}, got ${choice}`
      );
    }
    return locations[choice - 1];
  }

  private update(): void {
    const started = performance.now();
    const { heat, warnings } = generateHeatField(this.shots, this.ships);
    this.heat = heat;
    this.warnings = warnings;
    this.topMoves = findTopMoves(heat, this.shots);
    engineDebug(
      `heat field recomputed in ${(performance.now() - started).toFixed(2)}ms`,
      `(${this.topMoves.length} top moves, ${warnings.length} warnings)`
    );
  }
}
