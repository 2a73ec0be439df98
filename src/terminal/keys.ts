import type { Command, InputEvent } from '../types';

const CTRL_C = '\x03';

const ARROW_KEYS: Record<string, Command> = {
  '\x1b[A': 'speed-up',
  '\x1b[B': 'speed-down',
  '\x1b[C': 'step-forward',
  '\x1b[D': 'step-backward',
};

const KEY_COMMANDS: Record<string, Command> = {
  ' ': 'toggle-pause',
  p: 'toggle-pause',
  ']': 'speed-up',
  '+': 'speed-up',
  '=': 'speed-up',
  '[': 'speed-down',
  '-': 'speed-down',
  l: 'step-forward',
  h: 'step-backward',
  q: 'quit',
};

// CSI sequences (arrows, function keys) end with a byte in @..~
const CSI_SEQUENCE = /^\x1b\[[0-9;]*[@-~]/;

// One read can carry several keys when they arrive faster than the loop polls
export function parseKeys(data: string): InputEvent[] {
  const events: InputEvent[] = [];
  let rest = data;

  while (rest.length > 0) {
    const csi = CSI_SEQUENCE.exec(rest);
    if (csi) {
      events.push({ kind: 'key', command: ARROW_KEYS[csi[0]] ?? null });
      rest = rest.slice(csi[0].length);
      continue;
    }

    const [char] = rest;
    rest = rest.slice(char.length);

    if (char === CTRL_C) {
      events.push({ kind: 'interrupt' });
    } else {
      events.push({ kind: 'key', command: KEY_COMMANDS[char] ?? null });
    }
  }

  return events;
}
