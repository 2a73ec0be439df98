import type { DisplayView } from '../types';
import type { PacingEngine } from './engine';
import { calculateFocusIndex } from './word-processor';

const PERCENT_DECIMALS = 5;
const PERCENT_SCALE = 10 ** PERCENT_DECIMALS;

// Truncated, not rounded, on integers
export function formatPercent(position: number, total: number): string {
  if (total <= 0) return (0).toFixed(PERCENT_DECIMALS);
  const scaled = Math.floor((position * 100 * PERCENT_SCALE) / total);
  const whole = Math.floor(scaled / PERCENT_SCALE);
  const fraction = String(scaled % PERCENT_SCALE).padStart(PERCENT_DECIMALS, '0');
  return `${whole}.${fraction}`;
}

export function buildDisplayView(engine: PacingEngine, chunkSize: number): DisplayView {
  const window = engine.getWindow();
  const word = window.current();
  const { position, total } = window.progress();

  return {
    word,
    focusIndex: calculateFocusIndex(word),
    chunk: window.windowAround(chunkSize),
    wpm: engine.getWPM(),
    mode: engine.getMode(),
    progress: { position, total, percent: formatPercent(position, total) },
  };
}
