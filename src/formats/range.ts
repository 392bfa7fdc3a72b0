import type { AddressRange } from './types.js';

/** Size of the block selected by an Extended Linear Address record. */
export const PAGE_SIZE = 0x10000;

/** Default (and conventional maximum) data bytes per emitted Data record. */
export const MAX_RECORD_SIZE = 32;

/** Highest exclusive end address reachable through Extended Linear Address records. */
export const ADDRESS_SPACE_END = 0x1_0000_0000;

/**
 * 64 KiB page holding `address`.
 */
export function pageOf(address: number): number {
  return Math.floor(address / PAGE_SIZE);
}

/**
 * Split a window into Data record chunks.
 *
 * - Chunks are half-open `[start, end)` and cover the window in order.
 * - No chunk is longer than `recordSize`.
 * - No chunk crosses a {@link PAGE_SIZE} boundary; the chunk before a boundary is shortened to
 *   end exactly on it.
 * - For an empty window, `[]` is returned.
 */
export function splitIntoChunks(
  range: AddressRange,
  recordSize: number = MAX_RECORD_SIZE,
): AddressRange[] {
  const chunks: AddressRange[] = [];
  let chunkStart = range.start;

  while (chunkStart < range.end) {
    let len = Math.min(range.end - chunkStart, recordSize);
    const inPage = chunkStart % PAGE_SIZE;
    if (inPage + len > PAGE_SIZE - 1) {
      len = PAGE_SIZE - inPage;
    }
    chunks.push({ start: chunkStart, end: chunkStart + len });
    chunkStart += len;
  }

  return chunks;
}

/**
 * Validate a window against the buffer that backs it.
 *
 * Returns a problem description, or `undefined` when the window is usable.
 */
export function checkWindow(range: AddressRange, bufferLength: number): string | undefined {
  const { start, end } = range;
  if (!Number.isInteger(start) || !Number.isInteger(end)) {
    return `Window bounds must be integers (got [${start}, ${end})).`;
  }
  if (start < 0) return `Window start ${start} is negative.`;
  if (end < start) return `Window end 0x${end.toString(16)} is below start 0x${start.toString(16)}.`;
  if (end > ADDRESS_SPACE_END) {
    return `Window end 0x${end.toString(16)} is beyond the 32-bit address space.`;
  }
  if (bufferLength < end - start) {
    return `Buffer holds ${bufferLength} bytes but the window spans ${end - start}.`;
  }
  return undefined;
}

/**
 * Fresh buffer for `range`, every byte set to `fill`. Throws `RangeError` when the engine cannot
 * allocate it.
 */
export function allocateWindow(range: AddressRange, fill: number): Uint8Array {
  return new Uint8Array(range.end - range.start).fill(fill & 0xff);
}
