import type { DisplayChunk, ReadingProgress } from '../types';
import { EmptyDocumentError } from '../errors';

export class WordWindow {
  private readonly words: readonly string[];
  private cursor: number;

  constructor(words: readonly string[], start = 0) {
    if (words.length === 0) {
      throw new EmptyDocumentError();
    }
    if (!Number.isInteger(start) || start < 0 || start >= words.length) {
      throw new RangeError(`Start index ${start} is outside 0..${words.length - 1}`);
    }
    this.words = words;
    this.cursor = start;
  }

  current(): string {
    return this.wordAt(this.cursor);
  }

  position(): number {
    return this.cursor;
  }

  size(): number {
    return this.words.length;
  }

  advance(): string {
    if (this.cursor + 1 < this.words.length) {
      this.cursor++;
    }
    return this.current();
  }

  retreat(): string {
    if (this.cursor > 0) {
      this.cursor--;
    }
    return this.current();
  }

  progress(): ReadingProgress {
    return { position: this.cursor, total: this.words.length };
  }

  // Starts snap to a grid 2/3 of a chunk apart, with 1/6 of a chunk before the cursor
  windowAround(chunkSize: number): DisplayChunk {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }

    const step = Math.max(1, Math.floor((2 * chunkSize) / 3));
    const margin = Math.floor(chunkSize / 6);
    const anchor = this.cursor - margin;

    let start = anchor > 0 ? anchor - (anchor % step) : 0;
    start = Math.min(start, Math.max(0, this.words.length - chunkSize));

    return {
      words: this.words.slice(start, start + chunkSize),
      offset: this.cursor - start,
    };
  }

  private wordAt(index: number): string {
    const word = this.words[index];
    if (word === undefined) {
      throw new RangeError(`No word at index ${index}`);
    }
    return word;
  }
}
