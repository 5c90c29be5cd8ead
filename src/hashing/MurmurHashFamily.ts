import murmurHash3 from 'murmurhash3js';
import { ConfigurationError } from '../common/Errors';
import { IHashFamily } from './IHashFamily';

const MAX_SEED = 0xffffffff;

/**
 * murmurhash3js reads one byte per char code, so the value is first turned
 * into a latin1 string holding its UTF-8 bytes.
 */
function toByteString(value: string): string {
  return Buffer.from(value, 'utf8').toString('latin1');
}

function requireSeed(index: number): void {
  if (!Number.isInteger(index) || index < 0 || index > MAX_SEED) {
    throw new ConfigurationError(`Hash index must be an integer in [0, ${MAX_SEED}], got ${index}`);
  }
}

/**
 * MurmurHash3 x86 32-bit, seeded with the probe index.
 */
export class Murmur3x86HashFamily implements IHashFamily {
  public readonly width = 32;

  public hash(value: string, index: number): bigint {
    requireSeed(index);
    return BigInt(murmurHash3.x86.hash32(toByteString(value), index) >>> 0);
  }
}

/**
 * MurmurHash3 x64 128-bit, seeded with the probe index.
 */
export class Murmur3x64HashFamily implements IHashFamily {
  public readonly width = 128;

  public hash(value: string, index: number): bigint {
    requireSeed(index);
    const hex = murmurHash3.x64.hash128(toByteString(value), index);
    return BigInt(`0x${hex}`);
  }
}
