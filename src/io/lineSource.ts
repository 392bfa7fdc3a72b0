import { closeSync, openSync, readSync } from 'node:fs';

import type { LineSource } from '../formats/types.js';

/**
 * In-memory HEX text + precomputed line-start offsets.
 */
export class TextLineSource implements LineSource {
  /**
   * 0-based offsets for the start of each line. The first entry is always 0.
   */
  private readonly lineStarts: number[];
  private nextLine = 0;

  constructor(
    readonly text: string,
    readonly path: string = '<memory>',
  ) {
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') {
        this.lineStarts.push(i + 1);
      }
    }
  }

  rewind(): void {
    this.nextLine = 0;
  }

  readLine(): string | undefined {
    const from = this.lineStarts[this.nextLine];
    // A start at the very end is the empty tail after a final newline, not a line.
    if (from === undefined || from >= this.text.length) return undefined;
    const nextStart = this.lineStarts[this.nextLine + 1];
    this.nextLine++;
    return this.text.slice(from, nextStart === undefined ? this.text.length : nextStart - 1);
  }
}

const CHUNK_SIZE = 4096;

/**
 * Line source over an open file descriptor, read with blocking `readSync` calls.
 *
 * Bytes are decoded as latin1; valid HEX text is ASCII, and latin1 keeps one character per byte
 * for everything else.
 */
export class FileLineSource implements LineSource {
  private readonly chunk = Buffer.alloc(CHUNK_SIZE);
  private pending = '';
  private position = 0;
  private exhausted = false;

  constructor(
    private readonly fd: number,
    readonly path: string,
  ) {}

  /**
   * Open `path` for reading. The caller closes the source with {@link FileLineSource.close}.
   */
  static open(path: string): FileLineSource {
    return new FileLineSource(openSync(path, 'r'), path);
  }

  close(): void {
    closeSync(this.fd);
  }

  rewind(): void {
    this.pending = '';
    this.position = 0;
    this.exhausted = false;
  }

  readLine(): string | undefined {
    for (;;) {
      const newline = this.pending.indexOf('\n');
      if (newline >= 0) {
        const line = this.pending.slice(0, newline);
        this.pending = this.pending.slice(newline + 1);
        return line;
      }
      if (this.exhausted) {
        if (this.pending.length === 0) return undefined;
        const last = this.pending;
        this.pending = '';
        return last;
      }
      const n = readSync(this.fd, this.chunk, 0, CHUNK_SIZE, this.position);
      if (n === 0) {
        this.exhausted = true;
      } else {
        this.position += n;
        this.pending += this.chunk.toString('latin1', 0, n);
      }
    }
  }
}
