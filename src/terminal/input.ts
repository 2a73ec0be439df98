import type { EventEmitter } from 'events';
import type { InputEvent } from '../types';
import type { InputPoller } from '../rsvp/session';
import { parseKeys } from './keys';

export interface KeyStream {
  on(event: 'data', listener: (data: Buffer | string) => void): unknown;
  off(event: 'data', listener: (data: Buffer | string) => void): unknown;
  setRawMode?(mode: boolean): unknown;
  resume(): unknown;
  pause(): unknown;
}

const SIGNALS = ['SIGINT', 'SIGTERM'] as const;

// Keys and signals share one queue; a signal surfaces as an interrupt event
export class KeyboardInput implements InputPoller {
  private queue: InputEvent[] = [];
  private waiting: ((event: InputEvent) => void) | null = null;
  private timerId: ReturnType<typeof setTimeout> | null = null;
  private closed = false;

  private readonly onData = (data: Buffer | string) => {
    parseKeys(typeof data === 'string' ? data : data.toString('utf-8')).forEach(event =>
      this.push(event)
    );
  };

  private readonly onSignal = () => {
    this.push({ kind: 'interrupt' });
  };

  constructor(
    private readonly stream: KeyStream,
    private readonly signals: Pick<EventEmitter, 'on' | 'off'> = process
  ) {
    this.stream.setRawMode?.(true);
    this.stream.on('data', this.onData);
    this.stream.resume();
    SIGNALS.forEach(signal => this.signals.on(signal, this.onSignal));
  }

  poll(timeoutMs: number | null): Promise<InputEvent> {
    if (this.waiting !== null) {
      return Promise.reject(new Error('poll() called while a previous poll is pending'));
    }

    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'interrupt' });
    }

    return new Promise(resolve => {
      this.waiting = resolve;
      if (timeoutMs !== null) {
        this.timerId = setTimeout(() => this.settle({ kind: 'timeout' }), timeoutMs);
      }
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.stream.off('data', this.onData);
    this.stream.setRawMode?.(false);
    this.stream.pause();
    SIGNALS.forEach(signal => this.signals.off(signal, this.onSignal));
    this.settle({ kind: 'interrupt' });
  }

  private push(event: InputEvent): void {
    if (this.waiting !== null) {
      this.settle(event);
    } else {
      this.queue.push(event);
    }
  }

  private settle(event: InputEvent): void {
    if (this.timerId !== null) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    const resolve = this.waiting;
    this.waiting = null;
    resolve?.(event);
  }
}
