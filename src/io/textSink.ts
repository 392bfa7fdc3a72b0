import { closeSync, openSync, writeSync } from 'node:fs';

import type { TextSink } from '../formats/types.js';

/**
 * Sink that collects everything written into a string.
 */
export class TextBufferSink implements TextSink {
  private readonly parts: string[] = [];

  constructor(readonly path: string = '<memory>') {}

  write(text: string): void {
    this.parts.push(text);
  }

  get text(): string {
    return this.parts.join('');
  }
}

/**
 * Sink over an open file descriptor, written with blocking `writeSync` calls.
 */
export class FileSink implements TextSink {
  constructor(
    private readonly fd: number,
    readonly path: string,
  ) {}

  /**
   * Create (or truncate) `path` for writing. The caller closes the sink with {@link FileSink.close}.
   */
  static create(path: string): FileSink {
    return new FileSink(openSync(path, 'w'), path);
  }

  close(): void {
    closeSync(this.fd);
  }

  write(text: string): void {
    writeSync(this.fd, text, null, 'latin1');
  }
}
