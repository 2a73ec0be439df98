import type { DisplayView, PacingMode } from '../types';
import type { FrameRenderer } from '../rsvp/session';

const ESC = '\x1b[';
const RESET = `${ESC}0m`;
const FOCUS = `${ESC}1;31m`;
const INVERSE = `${ESC}7m`;
const CLEAR_SCREEN = `${ESC}H${ESC}2J`;
const HIDE_CURSOR = `${ESC}?25l`;
const SHOW_CURSOR = `${ESC}?25h`;

const DEFAULT_COLUMNS = 80;

const MODE_LABELS: Record<PacingMode, string> = {
  forward: 'READING',
  backward: 'REWINDING',
  paused: 'PAUSED',
  frozen: 'FROZEN',
};

export interface TerminalOutput {
  write(data: string): unknown;
  columns?: number;
}

function statusLine(view: DisplayView): string {
  const { position, total, percent } = view.progress;
  return `${MODE_LABELS[view.mode]}  ${view.wpm} wpm  ${position}/${total}  ${percent}%`;
}

// Pad the word so its focus letter always lands in the same column
function focusLines(view: DisplayView, center: number): string[] {
  const { word, focusIndex } = view;
  const pad = ' '.repeat(Math.max(0, center - focusIndex));
  const before = word.slice(0, focusIndex);
  const focus = word.charAt(focusIndex);
  const after = word.slice(focusIndex + 1);
  const marker = ' '.repeat(center);

  return [`${marker}▼`, `${pad}${before}${FOCUS}${focus}${RESET}${after}`, `${marker}▲`];
}

function chunkLines(view: DisplayView, columns: number): string[] {
  const lines: string[] = [];
  let line = '';
  let width = 0;

  view.chunk.words.forEach((word, i) => {
    const styled = i === view.chunk.offset ? `${INVERSE}${word}${RESET}` : word;
    if (width > 0 && width + 1 + word.length > columns) {
      lines.push(line);
      line = '';
      width = 0;
    }
    line += width > 0 ? ` ${styled}` : styled;
    width += (width > 0 ? 1 : 0) + word.length;
  });

  if (line.length > 0) lines.push(line);
  return lines;
}

export function renderFrame(view: DisplayView, columns: number): string[] {
  const center = Math.floor(columns / 2);
  return [statusLine(view), '', ...focusLines(view, center), '', ...chunkLines(view, columns)];
}

export class TerminalRenderer implements FrameRenderer {
  private active = false;

  constructor(private readonly output: TerminalOutput) {}

  render(view: DisplayView): void {
    if (!this.active) {
      this.output.write(HIDE_CURSOR);
      this.active = true;
    }
    const lines = renderFrame(view, this.output.columns ?? DEFAULT_COLUMNS);
    this.output.write(`${CLEAR_SCREEN}${lines.join('\r\n')}\r\n`);
  }

  close(): void {
    if (!this.active) return;
    this.active = false;
    this.output.write(`${CLEAR_SCREEN}${SHOW_CURSOR}`);
  }
}
