/**
 * Plain-text rendering of the board, recommendations and help.
 *
 * Cells: [0.42] untested heat, *0.42* primary recommendation, +0.42+ tied
 * alternative, [####] hit, [----] miss, [||||] sunk.
 */

import {
  ACTION_KINDS,
  coordinatesEqual,
  describeHeatWarning,
  formatCoordinate,
  syntaxHelp,
} from '@broadside/engine';
import type { Coordinate, GameState, ShotStatus } from '@broadside/engine';

function renderCell(status: ShotStatus, heat: number, rank: number): string {
  switch (status) {
    case 'hit':
      return '[####]';
    case 'miss':
      return '[----]';
    case 'sunk':
      return '[||||]';
    case 'untested': {
      const value = heat.toFixed(2);
      if (rank === 0) return `*${value}*`;
      if (rank > 0) return `+${value}+`;
      return `[${value}]`;
    }
  }
}

export function renderBoard(state: GameState): string {
  const heat = state.getHeatField();
  const topMoves = state.getTopMoves();
  const rankOf = (coord: Coordinate) =>
    topMoves.findIndex((move) => coordinatesEqual(move, coord));

  const rows = state
    .getShots()
    .toRows()
    .map((row, rowIndex) =>
      row
        .map((status, column) => {
          const coord = { row: rowIndex, column };
          return renderCell(status, heat.getValue(coord), rankOf(coord));
        })
        .join('')
    );

  return ['Board State:', ...rows].join('\n');
}

export function renderRecommendations(state: GameState): string {
  const [first, ...alternates] = state.getTopMoves();
  if (!first) return 'No recommended move.';

  const lines = [`Recommended move: ${formatCoordinate(first)}`];
  if (alternates.length > 0) {
    lines.push(`Alternate moves: ${alternates.map(formatCoordinate).join('')}`);
  }
  return lines.join('\n');
}

export function renderShips(state: GameState): string {
  const ships = state.getShips();
  return ships.length > 0 ? `Ships remaining: ${ships.join(', ')}` : 'Ships remaining: none';
}

export function renderWarnings(state: GameState): string[] {
  return state.getWarnings().map((warning) => `Warning: ${describeHeatWarning(warning)}`);
}

export function renderHelp(): string {
  return ['Available commands:', ...ACTION_KINDS.map(syntaxHelp)].join('\n');
}

export function renderState(state: GameState): string {
  return [renderBoard(state), renderShips(state), renderRecommendations(state)].join('\n');
}
