import type { Command, InputEvent, PacingMode, ReadingState, TickOutcome } from '../types';
import type { WordWindow } from './word-window';
import {
  calculateInterval,
  calculatePunctuationCredit,
  clampWPM,
  DEFAULT_WPM,
  WPM_STEP,
} from './timing';

type Listener<T> = (data: T) => void;

// Timers round to whole milliseconds, so a deadline can land a hair early
const CREDIT_EPSILON = 1e-9;

export interface PacingEngineOptions {
  wpm?: number;
  paused?: boolean;
  now?: () => number;
}

// credit: progress toward the next word, in intervals. Negative after punctuation.
export class PacingEngine {
  private state: ReadingState;
  private lastTick: number;
  private readonly now: () => number;
  private statusListeners = new Set<Listener<PacingMode>>();

  constructor(
    private readonly window: WordWindow,
    options: PacingEngineOptions = {}
  ) {
    this.now = options.now ?? (() => performance.now());
    this.state = {
      wpm: clampWPM(options.wpm ?? DEFAULT_WPM),
      paused: options.paused ?? false,
      credit: 0,
    };
    this.lastTick = this.now();
  }

  getState(): ReadingState {
    return { ...this.state };
  }

  getWindow(): WordWindow {
    return this.window;
  }

  getWPM(): number {
    return this.state.wpm;
  }

  getMode(): PacingMode {
    if (this.state.paused) return 'paused';
    if (this.state.wpm > 0) return 'forward';
    if (this.state.wpm < 0) return 'backward';
    return 'frozen';
  }

  isRunning(): boolean {
    return !this.state.paused && this.state.wpm !== 0;
  }

  interval(): number | null {
    return calculateInterval(this.state.wpm);
  }

  pollTimeout(): number | null {
    const interval = this.interval();
    if (this.state.paused || interval === null) return null;
    return Math.max(0, interval * (1 - this.state.credit));
  }

  onStatusChange(callback: Listener<PacingMode>): () => void {
    this.statusListeners.add(callback);
    return () => this.statusListeners.delete(callback);
  }

  tick(event: InputEvent): TickOutcome {
    switch (event.kind) {
      case 'interrupt':
        return 'interrupt';
      case 'timeout':
        this.onDeadline();
        return 'continue';
      case 'key':
        this.creditElapsed();
        return event.command === null ? 'continue' : this.apply(event.command);
    }
  }

  apply(command: Command): TickOutcome {
    const before = this.getMode();

    switch (command) {
      case 'quit':
        return 'quit';
      case 'toggle-pause':
        this.state.paused = !this.state.paused;
        this.resetCredit();
        break;
      case 'speed-up':
        this.state.wpm = clampWPM(this.state.wpm + WPM_STEP);
        break;
      case 'speed-down':
        this.state.wpm = clampWPM(this.state.wpm - WPM_STEP);
        break;
      case 'step-forward':
        if (!this.isRunning()) this.window.advance();
        break;
      case 'step-backward':
        if (!this.isRunning()) this.window.retreat();
        break;
    }

    this.notifyIfChanged(before);
    return 'continue';
  }

  addElapsed(elapsed: number): void {
    const interval = this.interval();
    if (this.state.paused || interval === null) return;
    this.state.credit += elapsed / interval;
  }

  // Every branch restarts the clock, recognised key or not
  private creditElapsed(): void {
    const now = this.now();
    this.addElapsed(now - this.lastTick);
    this.lastTick = now;
  }

  private onDeadline(): void {
    this.creditElapsed();
    if (!this.isRunning() || this.state.credit < 1 - CREDIT_EPSILON) return;

    const departed = this.window.current();
    const before = this.window.position();
    if (this.state.wpm > 0) {
      this.window.advance();
    } else {
      this.window.retreat();
    }

    if (this.window.position() === before) {
      // Ran off an end of the text; wait for the reader instead of spinning
      this.state.paused = true;
      this.resetCredit();
      this.notifyIfChanged(this.state.wpm > 0 ? 'forward' : 'backward');
      return;
    }

    this.state.credit = calculatePunctuationCredit(departed);
  }

  private resetCredit(): void {
    this.state.credit = 0;
    this.lastTick = this.now();
  }

  private notifyIfChanged(before: PacingMode): void {
    const mode = this.getMode();
    if (mode === before) return;
    this.statusListeners.forEach(cb => cb(mode));
  }
}
