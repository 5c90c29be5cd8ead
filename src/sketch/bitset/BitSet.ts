import { ConfigurationError, IndexError } from '../../common/Errors';

/**
 * BitSet - fixed-length packed bit array
 *
 * Bit i lives in byte floor(i / 8) at offset i % 8, so storage is exactly
 * ceil(length / 8) bytes.
 *
 * When constructed over a SharedArrayBuffer the set is safe to share between
 * worker threads: writes use Atomics.or and reads use Atomics.load, so a
 * reader sees each bit either before or after a concurrent set, never torn.
 */
export class BitSet {
  private readonly bytes: Uint8Array;
  private readonly shared: boolean;
  public readonly length: number;

  constructor(length: number, buffer?: ArrayBufferLike) {
    if (!Number.isInteger(length) || length <= 0) {
      throw new ConfigurationError(`BitSet length must be a positive integer, got ${length}`);
    }

    const byteSize = BitSet.byteSizeFor(length);
    if (buffer && buffer.byteLength !== byteSize) {
      throw new ConfigurationError(
        `BitSet of ${length} bits needs a ${byteSize}-byte buffer, got ${buffer.byteLength}`
      );
    }

    this.length = length;
    this.bytes = buffer ? new Uint8Array(buffer) : new Uint8Array(byteSize);
    this.shared = typeof SharedArrayBuffer !== 'undefined' && buffer instanceof SharedArrayBuffer;
  }

  public static byteSizeFor(length: number): number {
    return Math.ceil(length / 8);
  }

  /**
   * Allocate a zeroed SharedArrayBuffer sized for a BitSet of `length` bits.
   */
  public static allocateShared(length: number): SharedArrayBuffer {
    return new SharedArrayBuffer(BitSet.byteSizeFor(length));
  }

  public get byteSize(): number {
    return this.bytes.byteLength;
  }

  public get buffer(): ArrayBufferLike {
    return this.bytes.buffer;
  }

  public get(index: number): boolean {
    this.checkIndex(index);
    const byte = this.shared
      ? Atomics.load(this.bytes, index >>> 3)
      : this.bytes[index >>> 3] ?? 0;
    return (byte & (1 << (index & 7))) !== 0;
  }

  public set(index: number): void {
    this.checkIndex(index);
    const byteIndex = index >>> 3;
    const mask = 1 << (index & 7);
    if (this.shared) {
      Atomics.or(this.bytes, byteIndex, mask);
      return;
    }
    this.bytes[byteIndex] = (this.bytes[byteIndex] ?? 0) | mask;
  }

  public clearAll(): void {
    if (this.shared) {
      for (let i = 0; i < this.bytes.length; i++) {
        Atomics.store(this.bytes, i, 0);
      }
      return;
    }
    this.bytes.fill(0);
  }

  /**
   * Number of set bits.
   */
  public count(): number {
    let total = 0;
    for (let i = 0; i < this.bytes.length; i++) {
      let byte = this.shared ? Atomics.load(this.bytes, i) : this.bytes[i] ?? 0;
      while (byte !== 0) {
        byte &= byte - 1;
        total++;
      }
    }
    return total;
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new IndexError(index, this.length);
    }
  }
}
