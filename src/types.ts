export interface ReadingState {
  wpm: number;
  paused: boolean;
  credit: number;
}

export type PacingMode = 'paused' | 'forward' | 'backward' | 'frozen';

export type Command =
  | 'toggle-pause'
  | 'speed-up'
  | 'speed-down'
  | 'step-forward'
  | 'step-backward'
  | 'quit';

export type InputEvent =
  | { kind: 'timeout' }
  | { kind: 'key'; command: Command | null }
  | { kind: 'interrupt' };

export type TickOutcome = 'continue' | 'quit' | 'interrupt';

export interface DisplayChunk {
  words: string[];
  offset: number;
}

export interface ReadingProgress {
  position: number;
  total: number;
}

export interface DisplayView {
  word: string;
  focusIndex: number;
  chunk: DisplayChunk;
  wpm: number;
  mode: PacingMode;
  progress: ReadingProgress & { percent: string };
}

export interface SessionResult {
  reason: 'quit' | 'interrupt';
  position: number;
}
