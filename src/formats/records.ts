import { checksum } from './checksum.js';
import type { RecordHeader } from './types.js';

/** Width of the `:LLAAAATT` header; the payload starts at this column (0-based). */
export const HEADER_WIDTH = 9;

const HEX_DIGITS = /^[0-9A-Fa-f]+$/;

export function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

export function toHexWord(n: number): string {
  return (n & 0xffff).toString(16).toUpperCase().padStart(4, '0');
}

function parseHexDigits(line: string, offset: number, width: number): number | undefined {
  const digits = line.slice(offset, offset + width);
  if (digits.length !== width || !HEX_DIGITS.test(digits)) return undefined;
  return Number.parseInt(digits, 16);
}

/**
 * Parse exactly two hex digits at `offset`.
 */
export function parseHexByte(line: string, offset: number): number | undefined {
  return parseHexDigits(line, offset, 2);
}

/**
 * Parse exactly four hex digits at `offset` as a big-endian 16-bit value.
 */
export function parseHexWord(line: string, offset: number): number | undefined {
  return parseHexDigits(line, offset, 4);
}

/**
 * Parse the `:LLAAAATT` prefix of a record line into named fields.
 *
 * Anything after the header is left to the caller; a line shorter than the header, or one that
 * does not start with `:`, yields `undefined`.
 */
export function parseRecordHeader(line: string): RecordHeader | undefined {
  if (!line.startsWith(':')) return undefined;
  const length = parseHexByte(line, 1);
  const address = parseHexWord(line, 3);
  const type = parseHexByte(line, 7);
  if (length === undefined || address === undefined || type === undefined) return undefined;
  return { length, address, type };
}

/**
 * Format one record line (without line ending): header, uppercase payload, checksum.
 */
export function formatRecord(type: number, address: number, data: ArrayLike<number>): string {
  let payload = '';
  for (let i = 0; i < data.length; i++) {
    payload += toHexByte(data[i] ?? 0);
  }
  const cs = checksum(data.length, address, type, data);
  return `:${toHexByte(data.length)}${toHexWord(address)}${toHexByte(type)}${payload}${toHexByte(cs)}`;
}
