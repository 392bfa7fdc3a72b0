import { describe, expect, it } from 'vitest';

import { checksum } from '../src/formats/checksum.js';
import { patternBytes } from './helpers/hex.js';

describe('record checksum', () => {
  it('is the two complement of length, address, type and data', () => {
    expect(checksum(3, 0x0000, 0x00, [0x11, 0x22, 0x33])).toBe(0x97);
    expect(checksum(1, 0x1234, 0x00, [0xab])).toBe(0x0e);
  });

  it('matches the fixed extension and end-of-file records', () => {
    expect(checksum(0, 0, 0x01, [])).toBe(0xff);
    expect(checksum(2, 0, 0x04, [0x00, 0x01])).toBe(0xf9);
    expect(checksum(2, 0, 0x02, [0x10, 0x00])).toBe(0xec);
  });

  it('is zero when the byte sum is already a multiple of 256', () => {
    expect(checksum(1, 0, 0, [0xff])).toBe(0);
  });

  it('brings every record sum to 0 modulo 256', () => {
    const data = patternBytes(255);
    for (let len = 0; len <= 255; len += 17) {
      const address = (len * 0x0101) & 0xffff;
      const slice = data.subarray(0, len);
      const cs = checksum(len, address, 0, slice);
      const sum = slice.reduce((acc, b) => acc + b, len + (address & 0xff) + (address >> 8) + cs);
      expect(sum % 256).toBe(0);
    }
  });
});
