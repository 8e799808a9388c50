/**
 * Placement counting along a single line.
 *
 * A line is a boolean mask of cells that could hold a ship segment. It is cut
 * into streaks of equal values; each open streak is scored independently.
 */

import type { LineCount, Streak } from './types.js';

/** Run-length encode a line. An empty line has no streaks. */
export function getStreaks<T>(line: readonly T[]): Streak<T>[] {
  const streaks: Streak<T>[] = [];
  for (const value of line) {
    const last = streaks[streaks.length - 1];
    if (last && last.value === value) {
      last.length += 1;
    } else {
      streaks.push({ length: 1, value });
    }
  }
  return streaks;
}

/**
 * Count the ways a ship fits into an open stretch of `space` cells.
 *
 * There are `space - shipLength + 1` window placements; cell i is covered by
 * min(i + 1, space - i, shipLength, placements) of them.
 */
export function generateFreeSpace(space: number, shipLength: number): LineCount {
  if (shipLength > space) {
    return { counts: new Array<number>(space).fill(0), placements: 0 };
  }
  const placements = space - shipLength + 1;
  const counts = Array.from({ length: space }, (_, i) =>
    Math.min(i + 1, space - i, shipLength, placements)
  );
  return { counts, placements };
}

export function countLinePlacements(line: readonly boolean[], shipLength: number): LineCount {
  const counts: number[] = [];
  let placements = 0;

  for (const streak of getStreaks(line)) {
    if (!streak.value) {
      counts.push(...new Array<number>(streak.length).fill(0));
      continue;
    }
    const section = generateFreeSpace(streak.length, shipLength);
    counts.push(...section.counts);
    placements += section.placements;
  }

  return { counts, placements };
}

/**
 * Close every cell a ship of `shipLength` covering `hitIndex` cannot reach,
 * i.e. anything `shipLength` or more cells away from the hit.
 */
export function maskAroundHit(
  line: readonly boolean[],
  hitIndex: number,
  shipLength: number
): boolean[] {
  return line.map((open, index) =>
    index + shipLength <= hitIndex || hitIndex + shipLength <= index ? false : open
  );
}
