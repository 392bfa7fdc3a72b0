/**
 * Intel HEX record checksum: two's complement of the byte sum of length, address (both bytes),
 * type and data, truncated to 8 bits.
 *
 * Adding the result to that sum gives 0 modulo 256.
 */
export function checksum(
  length: number,
  address: number,
  type: number,
  data: ArrayLike<number>,
): number {
  let sum = (length & 0xff) + (address & 0xff) + ((address >> 8) & 0xff) + (type & 0xff);
  for (let i = 0; i < data.length; i++) {
    sum += (data[i] ?? 0) & 0xff;
  }
  return (0x100 - (sum & 0xff)) & 0xff;
}
