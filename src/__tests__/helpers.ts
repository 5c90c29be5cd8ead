import { IHashFamily } from '../hashing';

/**
 * mulberry32: small seeded PRNG so generated inputs are the same every run.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

export function randomStrings(count: number, length: number, seed: number): string[] {
  const next = seededRandom(seed);
  const result: string[] = [];
  for (let i = 0; i < count; i++) {
    let value = '';
    for (let j = 0; j < length; j++) {
      value += ALPHABET[Math.floor(next() * ALPHABET.length)];
    }
    result.push(value);
  }
  return result;
}

/**
 * Hash family whose output is looked up from a table, for steering values
 * into chosen bits or buckets.
 */
export class TableHashFamily implements IHashFamily {
  public readonly calls: Array<{ value: string; index: number }> = [];

  constructor(
    public readonly width: number,
    private readonly table: Record<string, bigint | ((index: number) => bigint)>
  ) {}

  public hash(value: string, index: number): bigint {
    this.calls.push({ value, index });
    const entry = this.table[value];
    if (entry === undefined) {
      throw new Error(`No hash registered for ${value}`);
    }
    return typeof entry === 'function' ? entry(index) : entry;
  }
}

export function snapshot(buffer: ArrayBufferLike): Uint8Array {
  return new Uint8Array(buffer).slice();
}
