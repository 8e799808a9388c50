import { formatCoordinate } from '@broadside/engine';
import type { SinkLocationResolver } from '@broadside/engine';

export interface PromptIO {
  ask(question: string): Promise<string>;
  write(line: string): void;
}

/**
 * Ask the player which candidate location the sunk ship occupied. Keeps
 * asking until the answer is a listed number.
 */
export function createSinkLocationPrompt(io: PromptIO): SinkLocationResolver {
  return async (candidates) => {
    io.write('The ship to sink could be in multiple places. Please select one:');
    candidates.forEach((cells, index) => {
      io.write(`${index + 1}: ${cells.map(formatCoordinate).join('')}`);
    });

    for (;;) {
      const answer = (await io.ask('> ')).trim();
      const choice = /^\d+$/.test(answer) ? Number(answer) : NaN;
      if (choice >= 1 && choice <= candidates.length) return choice;
      io.write('Invalid, please try again.');
    }
  };
}
