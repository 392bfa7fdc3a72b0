import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { TextBufferSink } from '../io/textSink.js';
import { checkWindow, MAX_RECORD_SIZE, pageOf, splitIntoChunks } from './range.js';
import { formatRecord } from './records.js';
import type { AddressRange, HexArtifact, TextSink, WriteHexOptions } from './types.js';
import { RecordTypes } from './types.js';

/** `currentPage` value before any Extended Linear Address record has been written. */
const NO_PAGE = -1;

/**
 * Emit the Intel HEX encoding of `buffer` (holding bytes for `range`) into `sink`.
 *
 * Implementation notes:
 * - Data records carry at most `recordSize` bytes (default 32) and never cross a 64 KiB page.
 * - When `range.end > 0xFFFF` an Extended Linear Address record precedes the first Data record;
 *   after that one is written whenever the page changes.
 * - The document always ends with `:00000001FF`.
 *
 * Returns `false` after pushing a diagnostic when the window is invalid or the sink fails.
 * A sink failure leaves whatever was already written in place.
 */
export function writeHexRecords(
  sink: TextSink,
  buffer: Uint8Array,
  range: AddressRange,
  diagnostics: Diagnostic[],
  opts?: WriteHexOptions,
): boolean {
  const lineEnding = opts?.lineEnding ?? '\n';
  const recordSize = opts?.recordSize ?? MAX_RECORD_SIZE;

  if (!Number.isInteger(recordSize) || recordSize < 1 || recordSize > 0xff) {
    diagnostics.push({
      id: DiagnosticIds.InvalidArgument,
      severity: 'error',
      message: `Record size must be an integer in 1..255 (got ${recordSize}).`,
      file: sink.path,
    });
    return false;
  }
  const problem = checkWindow(range, buffer.length);
  if (problem) {
    diagnostics.push({
      id: DiagnosticIds.InvalidWindow,
      severity: 'error',
      message: problem,
      file: sink.path,
    });
    return false;
  }

  const emit = (line: string): boolean => {
    try {
      sink.write(line + lineEnding);
      return true;
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.IoWriteFailed,
        severity: 'error',
        message: `I/O error during HEX write: ${String(err)}`,
        file: sink.path,
      });
      return false;
    }
  };

  let currentPage = range.end > 0xffff ? NO_PAGE : 0;

  for (const chunk of splitIntoChunks(range, recordSize)) {
    const page = pageOf(chunk.start);
    if (page !== currentPage) {
      const pageBytes = [(page >> 8) & 0xff, page & 0xff];
      if (!emit(formatRecord(RecordTypes.ExtendedLinearAddress, 0, pageBytes))) return false;
      currentPage = page;
    }
    const data = buffer.subarray(chunk.start - range.start, chunk.end - range.start);
    if (!emit(formatRecord(RecordTypes.Data, chunk.start & 0xffff, data))) return false;
  }

  return emit(formatRecord(RecordTypes.EndOfFile, 0, []));
}

/**
 * Create an Intel HEX artifact for `buffer` over `range`.
 *
 * On failure `artifact` is absent and `diagnostics` says why.
 */
export function writeHex(
  buffer: Uint8Array,
  range: AddressRange,
  opts?: WriteHexOptions,
): { artifact?: HexArtifact; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const sink = new TextBufferSink();
  if (!writeHexRecords(sink, buffer, range, diagnostics, opts)) return { diagnostics };
  return { artifact: { kind: 'hex', text: sink.text }, diagnostics };
}
