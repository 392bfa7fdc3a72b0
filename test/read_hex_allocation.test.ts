import { describe, expect, it, vi } from 'vitest';

import { DiagnosticIds } from '../src/diagnostics/types.js';
import { readHexToBin } from '../src/formats/readHex.js';
import { TextLineSource } from '../src/io/lineSource.js';

vi.mock('../src/formats/range.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/formats/range.js')>();
  return {
    ...actual,
    allocateWindow: () => {
      throw new RangeError('Array buffer allocation failed');
    },
  };
});

describe('readHexToBin allocation', () => {
  it('reports a window the engine cannot allocate as an invalid window', () => {
    const source = new TextLineSource(':0100000011EE\n', 'fw.hex');
    const res = readHexToBin(source, { start: 0, end: 0x1_0000_0000 });
    expect(res.artifact).toBeUndefined();
    expect(res.diagnostics).toEqual([
      {
        id: DiagnosticIds.InvalidWindow,
        severity: 'error',
        message: 'Cannot allocate a 4294967296-byte window: Array buffer allocation failed',
        file: 'fw.hex',
      },
    ]);
  });
});
