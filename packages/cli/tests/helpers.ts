import type { PromptIO } from '../src/prompt.js';

/** Answers questions from a script and records everything written. */
export function scriptedIO(answers: string[]): PromptIO & { written: string[] } {
  const queue = [...answers];
  const written: string[] = [];
  return {
    written,
    ask: async () => {
      const next = queue.shift();
      if (next === undefined) throw new Error('No scripted answer left');
      return next;
    },
    write: (line) => {
      written.push(line);
    },
  };
}
