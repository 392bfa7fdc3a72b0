import { describe, expect, it } from 'vitest';

import {
  formatRecord,
  parseHexByte,
  parseHexWord,
  parseRecordHeader,
} from '../src/formats/records.js';
import { RecordTypes } from '../src/formats/types.js';

describe('record header parsing', () => {
  it('parses the named header fields', () => {
    expect(parseRecordHeader(':10010000214601360121470136007EFE09D2190140')).toEqual({
      length: 16,
      address: 0x0100,
      type: RecordTypes.Data,
    });
    expect(parseRecordHeader(':0a00ff02')).toEqual({ length: 10, address: 0x00ff, type: 2 });
  });

  it('rejects lines without a full header', () => {
    expect(parseRecordHeader('10010000')).toBeUndefined();
    expect(parseRecordHeader(':1G010000')).toBeUndefined();
    expect(parseRecordHeader(':100100')).toBeUndefined();
    expect(parseRecordHeader('')).toBeUndefined();
  });

  it('requires exactly two or four hex digits for bytes and words', () => {
    expect(parseHexByte('xx1f', 2)).toBe(0x1f);
    expect(parseHexByte('abc', 2)).toBeUndefined();
    expect(parseHexByte('a+', 0)).toBeUndefined();
    expect(parseHexWord(':02000004FFFF', 9)).toBe(0xffff);
    expect(parseHexWord(':0200000412', 9)).toBeUndefined();
  });
});

describe('record formatting', () => {
  it('formats uppercase zero-padded records with a checksum', () => {
    expect(formatRecord(RecordTypes.Data, 0, [0x11, 0x22, 0x33])).toBe(':0300000011223397');
    expect(formatRecord(RecordTypes.Data, 0xabcd, [0x0a])).toBe(':01ABCD000A7D');
    expect(formatRecord(RecordTypes.ExtendedLinearAddress, 0, [0x00, 0x01])).toBe(
      ':020000040001F9',
    );
    expect(formatRecord(RecordTypes.EndOfFile, 0, [])).toBe(':00000001FF');
  });
});
