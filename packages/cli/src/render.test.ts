import { describe, it, expect } from 'vitest';
import { fire, GameState, hit, sink } from '@broadside/engine';
import {
  renderBoard,
  renderHelp,
  renderRecommendations,
  renderShips,
  renderState,
  renderWarnings,
} from './render.js';

describe('render', () => {
  it('marks the primary recommendation on a fresh board', () => {
    const state = new GameState({ width: 3, height: 1, ships: [2] });

    expect(renderBoard(state)).toBe('Board State:\n[0.50]*1.00*[0.50]');
    expect(renderRecommendations(state)).toBe('Recommended move: [2, 1]');
    expect(renderShips(state)).toBe('Ships remaining: 2');
  });

  it('marks misses and tied alternatives', async () => {
    const state = new GameState({ width: 3, height: 1, ships: [2] });
    await state.takeAction(fire({ row: 0, column: 0 }));

    expect(renderBoard(state)).toBe('Board State:\n[----]*1.00*+1.00+');
    expect(renderRecommendations(state)).toBe(
      'Recommended move: [2, 1]\nAlternate moves: [3, 1]'
    );
    expect(renderState(state)).toBe(
      [
        'Board State:',
        '[----]*1.00*+1.00+',
        'Ships remaining: 2',
        'Recommended move: [2, 1]',
        'Alternate moves: [3, 1]',
      ].join('\n')
    );
  });

  it('reports a finished board', async () => {
    const state = new GameState({ width: 2, height: 1, ships: [2] });
    await state.takeAction(hit({ row: 0, column: 0 }));
    await state.takeAction(hit({ row: 0, column: 1 }));
    await state.takeAction(sink(2));

    expect(renderBoard(state)).toBe('Board State:\n[||||][||||]');
    expect(renderRecommendations(state)).toBe('No recommended move.');
    expect(renderShips(state)).toBe('Ships remaining: none');
  });

  it('prefixes warnings', () => {
    const state = new GameState({ width: 3, height: 1, ships: [5] });
    expect(renderWarnings(state)).toEqual([
      "Warning: Ship of length 5 couldn't be placed a single time.",
    ]);
  });

  it('lists commands in catalogue order', () => {
    const lines = renderHelp().split('\n');
    expect(lines[0]).toBe('Available commands:');
    expect(lines[1]).toBe("'fire <column> <row>' [1-index] Fires at the specified coordinate.");
    expect(lines[lines.length - 1]).toBe("'undo' Undoes the most recent action.");
  });
});
