/**
 * Number of leading zero bits of `value` inside a field of `width` bits.
 * Works word by word with Math.clz32; a zero value has `width` leading zeros.
 * Bits of `value` above `width` are ignored.
 */
export function countLeadingZeros(value: bigint, width: number): number {
  let zeros = 0;

  for (let high = width; high > 0; high -= 32) {
    const low = Math.max(high - 32, 0);
    const span = high - low;
    const mask = (1n << BigInt(span)) - 1n;
    const word = Number((value >> BigInt(low)) & mask);

    if (word === 0) {
      zeros += span;
      continue;
    }

    // clz32 counts within 32 bits, so discount the padding of a narrower word
    return zeros + Math.clz32(word) - (32 - span);
  }

  return zeros;
}
