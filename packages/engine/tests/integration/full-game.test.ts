import { describe, it, expect } from 'vitest';

import { fire, hit, sink, undo } from '../../src/actions/action.js';
import { coordinatesEqual } from '../../src/grid/types.js';
import type { Coordinate } from '../../src/grid/types.js';
import { GameState } from '../../src/state/game-state.js';

// Hidden fleet on a 6x6 board: a destroyer along the top edge, a cruiser
// standing in the right-hand column.
const FLEET: Coordinate[][] = [
  [
    { row: 0, column: 0 },
    { row: 0, column: 1 },
  ],
  [
    { row: 2, column: 5 },
    { row: 3, column: 5 },
    { row: 4, column: 5 },
  ],
];

function shipAt(target: Coordinate): Coordinate[] | undefined {
  return FLEET.find((ship) => ship.some((cell) => coordinatesEqual(cell, target)));
}

function sameCells(a: Coordinate[], b: Coordinate[]): boolean {
  return a.length === b.length && a.every((cell) => b.some((other) => coordinatesEqual(cell, other)));
}

function expectResolvedCellsCold(state: GameState): void {
  const heat = state.getHeatField();
  state
    .getShots()
    .toRows()
    .forEach((row, rowIndex) =>
      row.forEach((status, column) => {
        const value = heat.getValue({ row: rowIndex, column });
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
        if (status !== 'untested') expect(value).toBe(0);
      })
    );
}

describe('Full game', () => {
  it('following the recommendations sinks the whole fleet', async () => {
    let sinking: Coordinate[] = [];
    const state = new GameState(
      { width: 6, height: 6, ships: [2, 3] },
      {
        resolveSinkLocation: async (candidates) =>
          candidates.findIndex((cells) => sameCells(cells, sinking)) + 1,
      }
    );

    let moves = 0;
    while (!state.isGameOver()) {
      const target = state.getRecommendedMove();
      expect(state.getShots().getValue(target)).toBe('untested');

      await state.takeAction(fire(target));
      const ship = shipAt(target);
      if (ship) {
        await state.takeAction(hit(target));
        const shots = state.getShots();
        if (ship.every((cell) => shots.getValue(cell) === 'hit')) {
          sinking = ship;
          await state.takeAction(sink(ship.length));
        }
      }

      expectResolvedCellsCold(state);
      moves += 1;
      expect(moves).toBeLessThanOrEqual(36);
    }

    const shots = state.getShots();
    for (const cell of FLEET.flat()) {
      expect(shots.getValue(cell)).toBe('sunk');
    }
    expect(state.getShips()).toEqual([]);
    expect(state.getWarnings()).toEqual([]);
    expect(state.getHeatField().findAll((value) => value !== 0)).toEqual([]);
  });

  it('undoing every action restores the opening board', async () => {
    const state = new GameState({ width: 6, height: 6, ships: [2, 3] });
    const openingHeat = state.getHeatField().toRows();
    const openingMoves = state.getTopMoves();

    await state.takeAction(fire({ row: 1, column: 1 }));
    await state.takeAction(fire({ row: 2, column: 3 }));
    await state.takeAction(hit({ row: 2, column: 3 }));
    await state.takeAction(fire({ row: 4, column: 0 }));
    expect(state.getHistory()).toHaveLength(4);

    while (state.getHistory().length > 0) {
      await state.takeAction(undo());
    }

    expect(state.getShots().findAll((status) => status !== 'untested')).toEqual([]);
    expect(state.getHeatField().toRows()).toEqual(openingHeat);
    expect(state.getTopMoves()).toEqual(openingMoves);
  });
});
