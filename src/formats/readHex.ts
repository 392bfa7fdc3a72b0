import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { allocateWindow, checkWindow } from './range.js';
import { HEADER_WIDTH, parseHexByte, parseHexWord, parseRecordHeader } from './records.js';
import type { AddressRange, BinArtifact, LineSource } from './types.js';
import { RecordTypes } from './types.js';

/**
 * State threaded from one line to the next during a single read pass.
 */
interface DecodeState {
  /** Address extension set by the last segment/linear address record. */
  offset: number;
  /** Highest `absolute + length` seen for an in-range Data record. */
  highest: number;
}

interface LineContext {
  source: LineSource;
  buffer: Uint8Array;
  range: AddressRange;
  diagnostics: Diagnostic[];
  lineNo: number;
}

function fail(ctx: LineContext, id: DiagnosticId, message: string, column?: number): undefined {
  ctx.diagnostics.push({
    id,
    severity: 'error',
    message,
    file: ctx.source.path,
    line: ctx.lineNo,
    ...(column !== undefined ? { column } : {}),
  });
  return undefined;
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function hex(n: number, width: number): string {
  return n.toString(16).toUpperCase().padStart(width, '0');
}

/**
 * Decode one record line. Returns the state for the next line, or `undefined` after pushing a
 * diagnostic.
 */
function decodeLine(line: string, state: DecodeState, ctx: LineContext): DecodeState | undefined {
  const { buffer, range, lineNo } = ctx;
  const header = parseRecordHeader(line);
  if (!header) {
    return fail(ctx, DiagnosticIds.MalformedHeader, `Invalid HEX record header at line ${lineNo}.`, 1);
  }

  let offset = state.offset;
  if (
    header.type === RecordTypes.ExtendedSegmentAddress ||
    header.type === RecordTypes.ExtendedLinearAddress
  ) {
    const value = parseHexWord(line, HEADER_WIDTH);
    if (value === undefined) {
      return fail(
        ctx,
        DiagnosticIds.MalformedExtensionAddress,
        `Invalid extended address at line ${lineNo}.`,
        HEADER_WIDTH + 1,
      );
    }
    offset = header.type === RecordTypes.ExtendedSegmentAddress ? value * 16 : value * 0x10000;
  }

  // Data records: `length` data pairs then the checksum pair. Other records: the first pair only.
  const isData = header.type === RecordTypes.Data;
  const pairs = isData ? header.length + 1 : 1;
  const absolute = header.address + offset;
  let highest = state.highest;

  for (let index = 0; index < pairs; index++) {
    const at = HEADER_WIDTH + index * 2;
    const byte = parseHexByte(line, at);
    if (byte === undefined) {
      const message =
        at + 2 > line.length
          ? `Truncated record at line ${lineNo}, offset ${at}.`
          : `Invalid HEX byte "${line.slice(at, at + 2)}" at line ${lineNo}, offset ${at}.`;
      return fail(ctx, DiagnosticIds.MalformedDataByte, message, at + 1);
    }
    if (!isData || index >= header.length) break;

    if (absolute < range.start) {
      return fail(
        ctx,
        DiagnosticIds.AddressBelowRange,
        `Address 0x${hex(absolute, 4)} is out of range at line ${lineNo}.`,
      );
    }
    if (absolute + header.length > range.end) {
      return fail(
        ctx,
        DiagnosticIds.AddressAboveRange,
        `Address 0x${hex(absolute, 4)} + ${header.length} is out of range at line ${lineNo}.`,
      );
    }
    highest = Math.max(highest, absolute + header.length);
    buffer[absolute - range.start + index] = byte;
  }

  return { offset, highest };
}

/**
 * Decode Intel HEX records from `source` into `buffer`, which holds the window `range`.
 *
 * - The source is rewound first; reading continues until it is exhausted (an EOF record does not
 *   stop the pass).
 * - Data record bytes land at `absolute - range.start`; a record reaching outside the window is
 *   an error, never a clamp.
 * - Checksums are not verified.
 *
 * Returns the number of bytes spanned (`highest written address - range.start`, 0 when no Data
 * record was decoded), or `undefined` after pushing a diagnostic. On failure the buffer keeps the
 * bytes of records decoded before the failing one.
 */
export function readHex(
  source: LineSource,
  buffer: Uint8Array,
  range: AddressRange,
  diagnostics: Diagnostic[],
): number | undefined {
  const problem = checkWindow(range, buffer.length);
  if (problem) {
    diagnostics.push({
      id: DiagnosticIds.InvalidWindow,
      severity: 'error',
      message: problem,
      file: source.path,
    });
    return undefined;
  }

  let state: DecodeState = { offset: 0, highest: range.start };
  let lineNo = 0;
  try {
    source.rewind();
    for (let raw = source.readLine(); raw !== undefined; raw = source.readLine()) {
      lineNo++;
      const ctx: LineContext = { source, buffer, range, diagnostics, lineNo };
      const next = decodeLine(stripCarriageReturn(raw), state, ctx);
      if (!next) return undefined;
      state = next;
    }
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `I/O error during HEX read after line ${lineNo}: ${String(err)}`,
      file: source.path,
    });
    return undefined;
  }

  return state.highest - range.start;
}

/**
 * Decode `source` into a fresh window buffer pre-filled with `fill` and return the spanned prefix
 * as a flat binary artifact.
 */
export function readHexToBin(
  source: LineSource,
  range: AddressRange,
  fill = 0xff,
): { artifact?: BinArtifact; diagnostics: Diagnostic[] } {
  const diagnostics: Diagnostic[] = [];
  const problem = checkWindow(range, Number.POSITIVE_INFINITY);
  if (problem) {
    diagnostics.push({
      id: DiagnosticIds.InvalidWindow,
      severity: 'error',
      message: problem,
      file: source.path,
    });
    return { diagnostics };
  }
  let buffer: Uint8Array;
  try {
    buffer = allocateWindow(range, fill);
  } catch (err) {
    if (!(err instanceof RangeError)) throw err;
    diagnostics.push({
      id: DiagnosticIds.InvalidWindow,
      severity: 'error',
      message: `Cannot allocate a ${range.end - range.start}-byte window: ${err.message}`,
      file: source.path,
    });
    return { diagnostics };
  }
  const spanned = readHex(source, buffer, range, diagnostics);
  if (spanned === undefined) return { diagnostics };
  return { artifact: { kind: 'bin', bytes: buffer.subarray(0, spanned) }, diagnostics };
}
