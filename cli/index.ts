#!/usr/bin/env node
import { loadConfig, parseCliArgs, USAGE } from './config';
import type { AppConfig } from './config';
import { openKeyboard } from './keyboard';
import { readSource } from './source';
import { describeFailure, resumeHint } from './report';
import { ConfigError } from '../src/errors';
import { createLogger, isDebugLogging, setDebugLogging } from '../src/logger';
import { PacingEngine } from '../src/rsvp/engine';
import { runSession } from '../src/rsvp/session';
import { processText } from '../src/rsvp/word-processor';
import { WordWindow } from '../src/rsvp/word-window';
import { KeyboardInput } from '../src/terminal/input';
import { TerminalRenderer } from '../src/terminal/renderer';
import type { SessionResult } from '../src/types';

const log = createLogger('MAIN');

async function read(config: AppConfig): Promise<SessionResult> {
  const text = await readSource(config.source);
  const words = processText(text);
  log.debug(`Read ${words.length} words`, { source: config.source ?? 'stdin' });

  const { wpm, chunkSize, skip } = config.reading;
  if (words.length > 0 && skip >= words.length) {
    throw new ConfigError(`--skip ${skip} is past the end of the text (${words.length} words)`);
  }

  const window = new WordWindow(words, skip);
  const engine = new PacingEngine(window, { wpm });

  const keyboard = openKeyboard(config.source);
  const input = new KeyboardInput(keyboard);
  const renderer = new TerminalRenderer(process.stdout);

  try {
    return await runSession(engine, input, renderer, { chunkSize });
  } finally {
    renderer.close();
    input.close();
    if (keyboard !== process.stdin) {
      try {
        keyboard.destroy();
      } catch (err) {
        log.error('Failed to release the terminal', err);
      }
    }
  }
}

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));
  setDebugLogging(cliArgs.debug ?? false);

  if (cliArgs.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const config = loadConfig(cliArgs);
  setDebugLogging(config.debug);

  const result = await read(config);
  if (result.reason === 'interrupt') {
    console.log(resumeHint(result.position));
  }
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(describeFailure(err, isDebugLogging()));
    process.exitCode = 1;
  }
);
