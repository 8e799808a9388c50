import { createInterface } from 'readline/promises';
import { GameState } from '@broadside/engine';
import { ConfigError, loadConfig, parseFlags } from './config.js';
import { createSinkLocationPrompt } from './prompt.js';
import type { PromptIO } from './prompt.js';
import { renderHelp, renderState, renderWarnings } from './render.js';
import { runCommand } from './session.js';

async function main(argv: string[]): Promise<void> {
  const config = await loadConfig(parseFlags(argv), process.env);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  const io: PromptIO = {
    ask: (question) => rl.question(question),
    write: (line) => console.log(line),
  };

  const state = new GameState(config, {
    resolveSinkLocation: createSinkLocationPrompt(io),
  });

  io.write(renderHelp());
  io.write(renderState(state));
  renderWarnings(state).forEach((warning) => console.warn(warning));

  while (!closed) {
    let input: string;
    try {
      input = await io.ask('Please enter a command.\n');
    } catch (err) {
      // stdin ended while waiting
      if (closed) break;
      throw err;
    }
    if (input.trim() === '') continue;

    const result = await runCommand(state, input);
    io.write(result.message);
    if (result.ok) {
      io.write(renderState(state));
      renderWarnings(state).forEach((warning) => console.warn(warning));
    }
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
