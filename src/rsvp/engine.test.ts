import { describe, it, expect, vi } from 'vitest';
import { PacingEngine } from './engine';
import { WordWindow } from './word-window';
import type { Command } from '../types';

function createEngine(
  words: string[],
  options: { wpm?: number; paused?: boolean; start?: number } = {}
) {
  const clock = { now: 0 };
  const window = new WordWindow(words, options.start ?? 0);
  const engine = new PacingEngine(window, {
    wpm: options.wpm ?? 500,
    paused: options.paused,
    now: () => clock.now,
  });
  return { engine, window, clock };
}

const key = (command: Command | null) => ({ kind: 'key', command }) as const;
const TIMEOUT = { kind: 'timeout' } as const;

describe('PacingEngine', () => {
  describe('scheduling', () => {
    it('waits one interval for the first word', () => {
      const { engine } = createEngine(['a', 'b']);
      expect(engine.interval()).toBe(120);
      expect(engine.pollTimeout()).toBe(120);
    });

    it('advances once a full interval has elapsed', () => {
      const { engine, window, clock } = createEngine(['one', 'two', 'three']);
      clock.now = 120;
      expect(engine.tick(TIMEOUT)).toBe('continue');
      expect(window.current()).toBe('two');
      expect(engine.getState().credit).toBe(0);
    });

    it('does not advance on a deadline that fired early', () => {
      const { engine, window, clock } = createEngine(['one', 'two']);
      clock.now = 119;
      engine.tick(TIMEOUT);
      expect(window.position()).toBe(0);
      expect(engine.pollTimeout()).toBeCloseTo(1, 9);
    });

    it('keeps half-finished waits across a keystroke', () => {
      const { engine, window, clock } = createEngine(['one', 'two']);
      clock.now = 60;
      engine.tick(key(null));
      expect(engine.getState().credit).toBe(0.5);
      expect(engine.pollTimeout()).toBe(60);
      expect(window.position()).toBe(0);

      clock.now = 120;
      engine.tick(TIMEOUT);
      expect(window.current()).toBe('two');
    });

    it('holds the word after a strong stop for two intervals', () => {
      const { engine, window, clock } = createEngine(['example.', 'next', 'more']);
      clock.now = 120;
      engine.tick(TIMEOUT);
      expect(window.current()).toBe('next');
      expect(engine.getState().credit).toBe(-1);
      expect(engine.pollTimeout()).toBe(240);

      clock.now = 240;
      engine.tick(TIMEOUT);
      expect(window.current()).toBe('next');

      clock.now = 360;
      engine.tick(TIMEOUT);
      expect(window.current()).toBe('more');
      expect(engine.getState().credit).toBe(0);
    });

    it('holds the word after a comma for an extra half interval', () => {
      const { engine, clock } = createEngine(['well,', 'then']);
      clock.now = 120;
      engine.tick(TIMEOUT);
      expect(engine.getState().credit).toBe(-0.5);
      expect(engine.pollTimeout()).toBe(180);
    });

    it('reads backwards at a negative speed', () => {
      const { engine, window, clock } = createEngine(['a', 'b', 'c'], { wpm: -500, start: 2 });
      expect(engine.getMode()).toBe('backward');
      clock.now = 120;
      engine.tick(TIMEOUT);
      expect(window.current()).toBe('b');
    });

    it('applies a direction change only at the next advance', () => {
      const { engine, window, clock } = createEngine(['a', 'b', 'c'], { wpm: 50, start: 1 });
      clock.now = 600;
      engine.tick(key('speed-down'));
      engine.tick(key('speed-down'));
      expect(engine.getWPM()).toBe(-50);
      expect(window.current()).toBe('b');
      expect(engine.getState().credit).toBe(0.5);

      clock.now = 1200;
      engine.tick(TIMEOUT);
      expect(window.current()).toBe('a');
    });

    it('adds elapsed time the same in one step or two', () => {
      const split = createEngine(['a', 'b']).engine;
      split.addElapsed(30);
      split.addElapsed(45);

      const whole = createEngine(['a', 'b']).engine;
      whole.addElapsed(75);

      expect(split.getState().credit).toBeCloseTo(whole.getState().credit, 12);
      expect(whole.getState().credit).toBeCloseTo(0.625, 12);
    });

    it('restarts the clock on keys it does not recognise', () => {
      const { engine, clock } = createEngine(['a', 'b']);
      clock.now = 30;
      engine.tick(key(null));
      clock.now = 60;
      engine.tick(key(null));
      expect(engine.getState().credit).toBe(0.5);
    });
  });

  describe('pause', () => {
    it('waits for a key while paused', () => {
      const { engine } = createEngine(['a', 'b'], { paused: true });
      expect(engine.getMode()).toBe('paused');
      expect(engine.pollTimeout()).toBeNull();
    });

    it('resets credit to zero on every toggle', () => {
      const { engine, clock } = createEngine(['a', 'b']);
      clock.now = 60;
      engine.tick(key('toggle-pause'));
      expect(engine.getState()).toEqual({ wpm: 500, paused: true, credit: 0 });

      clock.now = 5000;
      engine.tick(key('toggle-pause'));
      expect(engine.getState()).toEqual({ wpm: 500, paused: false, credit: 0 });
      expect(engine.pollTimeout()).toBe(120);
    });

    it('ignores time spent paused', () => {
      const { engine, window, clock } = createEngine(['a', 'b'], { paused: true });
      clock.now = 10000;
      engine.tick(key('toggle-pause'));
      clock.now = 10060;
      engine.tick(TIMEOUT);
      expect(window.position()).toBe(0);
      expect(engine.getState().credit).toBe(0.5);
    });

    it('ignores deadlines while paused', () => {
      const { engine, window, clock } = createEngine(['a', 'b'], { paused: true });
      clock.now = 500;
      engine.tick(TIMEOUT);
      expect(window.position()).toBe(0);
      expect(engine.getState().credit).toBe(0);
    });

    it('pauses on reaching the end of the text', () => {
      const { engine, window, clock } = createEngine(['a', 'b'], { start: 1 });
      const listener = vi.fn();
      engine.onStatusChange(listener);

      clock.now = 120;
      engine.tick(TIMEOUT);
      expect(window.position()).toBe(1);
      expect(engine.getMode()).toBe('paused');
      expect(engine.getState().credit).toBe(0);
      expect(listener).toHaveBeenCalledWith('paused');
    });
  });

  describe('speed', () => {
    it('steps by 50 wpm without touching pause or credit', () => {
      const { engine, clock } = createEngine(['a', 'b']);
      clock.now = 60;
      engine.tick(key('speed-up'));
      expect(engine.getState()).toEqual({ wpm: 550, paused: false, credit: 0.5 });

      engine.tick(key('speed-down'));
      engine.tick(key('speed-down'));
      expect(engine.getWPM()).toBe(450);
    });

    it('clamps to +-1000 wpm', () => {
      const { engine } = createEngine(['a']);
      for (let i = 0; i < 30; i++) engine.apply('speed-up');
      expect(engine.getWPM()).toBe(1000);
      for (let i = 0; i < 60; i++) engine.apply('speed-down');
      expect(engine.getWPM()).toBe(-1000);
    });

    it('clamps an out-of-range starting speed', () => {
      const { engine } = createEngine(['a'], { wpm: 5000 });
      expect(engine.getWPM()).toBe(1000);
    });

    it('stays in range under any mix of speed commands', () => {
      const { engine } = createEngine(['a'], { wpm: 950 });
      const pattern: Command[] = ['speed-up', 'speed-up', 'speed-down', 'speed-up'];
      for (let i = 0; i < 100; i++) {
        engine.apply(pattern[i % pattern.length]);
        expect(Math.abs(engine.getWPM())).toBeLessThanOrEqual(1000);
      }
      expect(engine.getWPM()).toBe(1000);
    });

    it('freezes at zero without a deadline', () => {
      const { engine, window, clock } = createEngine(['a', 'b'], { wpm: 50 });
      engine.apply('speed-down');
      expect(engine.getMode()).toBe('frozen');
      expect(engine.interval()).toBeNull();
      expect(engine.pollTimeout()).toBeNull();

      clock.now = 100000;
      engine.tick(TIMEOUT);
      engine.tick(key(null));
      expect(window.position()).toBe(0);
      expect(Number.isFinite(engine.getState().credit)).toBe(true);
    });
  });

  describe('manual steps', () => {
    it('are ignored while running', () => {
      const { engine, window } = createEngine(['a', 'b', 'c']);
      engine.tick(key('step-forward'));
      expect(window.position()).toBe(0);
    });

    it('move the window while paused', () => {
      const { engine, window } = createEngine(['a', 'b', 'c'], { paused: true });
      engine.tick(key('step-forward'));
      engine.tick(key('step-forward'));
      engine.tick(key('step-backward'));
      expect(window.current()).toBe('b');
    });

    it('move the window while frozen', () => {
      const { engine, window } = createEngine(['a', 'b', 'c'], { wpm: 0 });
      engine.tick(key('step-forward'));
      expect(window.current()).toBe('b');
    });

    it('stop at the ends of the text', () => {
      const { engine, window } = createEngine(['a', 'b'], { paused: true });
      engine.tick(key('step-backward'));
      expect(window.position()).toBe(0);
    });
  });

  describe('termination', () => {
    it('quits on the quit command', () => {
      const { engine } = createEngine(['a']);
      expect(engine.tick(key('quit'))).toBe('quit');
    });

    it('ends on an interrupt', () => {
      const { engine } = createEngine(['a']);
      expect(engine.tick({ kind: 'interrupt' })).toBe('interrupt');
    });
  });

  describe('onStatusChange', () => {
    it('reports mode changes until unsubscribed', () => {
      const { engine } = createEngine(['a', 'b']);
      const listener = vi.fn();
      const unsubscribe = engine.onStatusChange(listener);

      engine.apply('toggle-pause');
      engine.apply('speed-up');
      unsubscribe();
      engine.apply('toggle-pause');

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith('paused');
    });
  });
});
