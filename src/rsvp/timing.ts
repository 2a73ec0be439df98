// Ending a word with one of these holds the next word for a full extra interval
export const STRONG_STOP_MARKS = new Set(['!', '?', '.', ';', ':']);

// Credit owed after a word, in fractions of an interval
const STRONG_STOP_CREDIT = -1;
const OTHER_MARK_CREDIT = -0.5;

export const DEFAULT_WPM = 500;
export const MIN_WPM = -1000;
export const MAX_WPM = 1000;
export const WPM_STEP = 50;

// Negative speeds read backwards at the same pace
export function calculateInterval(wpm: number): number | null {
  if (wpm === 0) return null;
  return Math.abs(60000 / wpm);
}

export function clampWPM(wpm: number): number {
  return Math.min(MAX_WPM, Math.max(MIN_WPM, wpm));
}

export function calculatePunctuationCredit(word: string): number {
  const lastChar = Array.from(word).pop();
  if (lastChar === undefined || /\p{L}/u.test(lastChar)) return 0;
  return STRONG_STOP_MARKS.has(lastChar) ? STRONG_STOP_CREDIT : OTHER_MARK_CREDIT;
}
