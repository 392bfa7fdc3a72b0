import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { writeHex, writeHexRecords } from '../src/formats/writeHex.js';
import { FailingSink, patternBytes, recordBytes, recordLines } from './helpers/hex.js';

function hexText(buffer: Uint8Array, start: number, end: number): string {
  const res = writeHex(buffer, { start, end });
  expect(res.diagnostics).toEqual([]);
  return res.artifact?.text ?? '';
}

describe('writeHex', () => {
  it('encodes a small image in the first page without extension records', () => {
    const text = hexText(Uint8Array.of(0x11, 0x22, 0x33), 0, 3);
    expect(text).toBe(':0300000011223397\n:00000001FF\n');
  });

  it('writes an extended linear address record for a window above 64K', () => {
    const text = hexText(Uint8Array.of(0x11, 0x22, 0x33), 0x10000, 0x10003);
    expect(recordLines(text)).toEqual([':020000040001F9', ':0300000011223397', ':00000001FF']);
  });

  it('selects page 0 explicitly when the window ends past 0xFFFF', () => {
    const text = hexText(Uint8Array.of(0x11, 0x22, 0x33), 0xfffd, 0x10000);
    expect(recordLines(text)).toEqual([':020000040000FA', ':03FFFD001122339B', ':00000001FF']);
  });

  it('splits a chunk at the page boundary and switches page', () => {
    const text = hexText(Uint8Array.of(1, 2, 3, 4), 0xfffe, 0x10002);
    expect(recordLines(text)).toEqual([
      ':020000040000FA',
      ':02FFFE000102FE',
      ':020000040001F9',
      ':020000000304F7',
      ':00000001FF',
    ]);
  });

  it('emits only the end-of-file record for an empty window', () => {
    expect(hexText(new Uint8Array(0), 0x200, 0x200)).toBe(':00000001FF\n');
  });

  it('limits data records to 32 bytes', () => {
    const lines = recordLines(hexText(patternBytes(70), 0, 70));
    expect(lines).toHaveLength(4);
    expect(lines.slice(0, 3).map((l) => l.slice(1, 7))).toEqual(['200000', '200020', '060040']);
  });

  it('honors recordSize and lineEnding options', () => {
    const res = writeHex(Uint8Array.of(0xaa, 0xbb), { start: 0, end: 2 }, {
      recordSize: 1,
      lineEnding: '\r\n',
    });
    expect(res.artifact?.text).toBe(':01000000AA55\r\n:01000100BB43\r\n:00000001FF\r\n');
  });

  it('keeps every record summing to zero and within its page', () => {
    const start = 0x1fff0;
    const end = 0x30010;
    const lines = recordLines(hexText(patternBytes(end - start), start, end));

    let page = -1;
    let next = start;
    let extensionRecords = 0;
    for (const line of lines) {
      const bytes = recordBytes(line);
      expect(bytes.reduce((acc, b) => acc + b, 0) % 256).toBe(0);
      const [len = 0, hi = 0, lo = 0, type] = bytes;
      if (type === 0x04) {
        extensionRecords++;
        page = ((bytes[4] ?? 0) << 8) | (bytes[5] ?? 0);
        continue;
      }
      if (type !== 0x00) continue;
      const address = page * 0x10000 + ((hi << 8) | lo);
      expect(len).toBeLessThanOrEqual(32);
      expect(address).toBe(next);
      expect(Math.floor(address / 0x10000)).toBe(Math.floor((address + len - 1) / 0x10000));
      next += len;
    }
    expect(next).toBe(end);
    expect(extensionRecords).toBe(3);
    expect(lines[lines.length - 1]).toBe(':00000001FF');
  });
});

describe('writeHexRecords failures', () => {
  it('stops at the first failed write and reports it', () => {
    const sink = new FailingSink(1);
    const diagnostics: Diagnostic[] = [];
    const ok = writeHexRecords(sink, patternBytes(40), { start: 0, end: 40 }, diagnostics);

    expect(ok).toBe(false);
    expect(sink.writes).toHaveLength(1);
    expect(diagnostics).toEqual([
      {
        id: DiagnosticIds.IoWriteFailed,
        severity: 'error',
        message: 'I/O error during HEX write: Error: disk full',
        file: 'failing.hex',
      },
    ]);
  });

  it('rejects a buffer smaller than the window', () => {
    const res = writeHex(new Uint8Array(2), { start: 0, end: 3 });
    expect(res.artifact).toBeUndefined();
    expect(res.diagnostics.map((d) => d.id)).toEqual([DiagnosticIds.InvalidWindow]);
    expect(res.diagnostics[0]?.file).toBe('<memory>');
  });

  it('rejects an out-of-range record size', () => {
    const res = writeHex(new Uint8Array(2), { start: 0, end: 2 }, { recordSize: 0 });
    expect(res.artifact).toBeUndefined();
    expect(res.diagnostics[0]?.message).toBe('Record size must be an integer in 1..255 (got 0).');
  });
});
