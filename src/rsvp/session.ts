import type { DisplayView, InputEvent, SessionResult } from '../types';
import type { PacingEngine } from './engine';
import { buildDisplayView } from './display';
import { createLogger } from '../logger';

const log = createLogger('SESSION');

export interface InputPoller {
  // Never times out for null
  poll(timeoutMs: number | null): Promise<InputEvent>;
}

export interface FrameRenderer {
  render(view: DisplayView): void;
}

export interface SessionOptions {
  chunkSize: number;
}

// Only this loop touches the cursor and the reading state
export async function runSession(
  engine: PacingEngine,
  input: InputPoller,
  renderer: FrameRenderer,
  options: SessionOptions
): Promise<SessionResult> {
  const unsubscribe = engine.onStatusChange(mode => log.debug(`Mode -> ${mode}`));

  try {
    for (;;) {
      renderer.render(buildDisplayView(engine, options.chunkSize));

      const timeout = engine.pollTimeout();
      const event = await input.poll(timeout);
      const outcome = engine.tick(event);

      if (outcome !== 'continue') {
        const position = engine.getWindow().position();
        log.debug(`Session ended (${outcome})`, { position });
        return { reason: outcome, position };
      }
    }
  } finally {
    unsubscribe();
  }
}
