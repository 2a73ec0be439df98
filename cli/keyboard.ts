import * as fs from 'fs';
import * as tty from 'tty';
import { InputSourceError } from '../src/errors';
import type { KeyStream } from '../src/terminal/input';

export interface KeyboardStream extends KeyStream {
  isTTY?: boolean;
  destroy(): unknown;
}

export interface TerminalAccess {
  stdin: KeyboardStream;
  openTerminal: () => KeyboardStream;
}

const processTerminal: TerminalAccess = {
  stdin: process.stdin,
  openTerminal: () => new tty.ReadStream(fs.openSync('/dev/tty', 'r')),
};

export function openKeyboard(
  source: string | null,
  access: TerminalAccess = processTerminal
): KeyboardStream {
  // stdin is only free for keys when the text came from a file
  if (source !== null && access.stdin.isTTY === true) {
    return access.stdin;
  }

  try {
    return access.openTerminal();
  } catch (err) {
    throw new InputSourceError('No terminal available for keyboard input', { cause: err });
  }
}
