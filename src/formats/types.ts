/**
 * Half-open absolute address window over a caller-owned buffer.
 *
 * Buffer index = absolute address - `start`.
 */
export interface AddressRange {
  /** Inclusive start address. */
  start: number;
  /** Exclusive end address. */
  end: number;
}

/**
 * Record types understood by the codec.
 */
export const RecordTypes = {
  Data: 0x00,
  EndOfFile: 0x01,
  ExtendedSegmentAddress: 0x02,
  ExtendedLinearAddress: 0x04,
} as const;

/**
 * Parsed `:LLAAAATT` prefix of a record line.
 *
 * `type` is the raw byte: unsupported types still parse and are skipped by the reader.
 */
export interface RecordHeader {
  /** Payload byte count (0..255). */
  length: number;
  /** Record-local 16-bit address. */
  address: number;
  type: number;
}

/**
 * Line-oriented, synchronous input stream.
 */
export interface LineSource {
  /** Name used in diagnostics. */
  readonly path: string;
  /** Reposition at the first line. */
  rewind(): void;
  /**
   * Next line without its `\n` terminator (a `\r` is left in place), or `undefined` once the
   * stream is exhausted. May throw on I/O failure.
   */
  readLine(): string | undefined;
}

/**
 * Synchronous text output stream. `write` throws on I/O failure.
 */
export interface TextSink {
  /** Name used in diagnostics. */
  readonly path: string;
  write(text: string): void;
}

/**
 * Options for Intel HEX writing.
 */
export interface WriteHexOptions {
  /**
   * Line ending to use when emitting records.
   */
  lineEnding?: '\n' | '\r\n';
  /**
   * Maximum data bytes per Data record (1..255). Defaults to 32.
   */
  recordSize?: number;
}

/**
 * In-memory Intel HEX artifact.
 */
export interface HexArtifact {
  kind: 'hex';
  text: string;
}

/**
 * In-memory flat binary artifact: the decoded window prefix.
 */
export interface BinArtifact {
  kind: 'bin';
  bytes: Uint8Array;
}
