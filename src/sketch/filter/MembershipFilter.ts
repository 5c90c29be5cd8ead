import { requirePositiveInteger } from '../../common/Config';
import { IHashFamily, Murmur3x86HashFamily } from '../../hashing';
import { BitSet } from '../bitset';
import { calculateOptimalParams, falsePositiveRate } from './FilterSizing';
import {
  FilterSizingConfig,
  IMembershipFilter,
  MembershipFilterConfig,
  MembershipFilterStats,
} from './IMembershipFilter';

/**
 * MembershipFilter - Bloom filter over a packed bit array
 *
 * Each operation probes k positions, one seeded hash per probe:
 * position i is hash(value, i) mod capacity. `check` is true only when every
 * probed bit is set, so a value that was added is always reported present.
 * Values that were never added may be reported present with probability
 * (1 - e^(-kn/m))^k; that is a statistical property, not an error.
 *
 * Bits are never cleared. The filter takes any string, the empty string
 * included; rejecting malformed input is up to the caller.
 */
export class MembershipFilter implements IMembershipFilter {
  private readonly bits: BitSet;
  private readonly hashFamily: IHashFamily;
  private readonly modulus: bigint;
  public readonly capacity: number;
  public readonly hashCount: number;

  constructor(config: MembershipFilterConfig) {
    requirePositiveInteger('capacity', config.capacity);
    requirePositiveInteger('hashCount', config.hashCount);

    this.capacity = config.capacity;
    this.hashCount = config.hashCount;
    this.hashFamily = config.hashFamily ?? new Murmur3x86HashFamily();
    this.modulus = BigInt(config.capacity);
    this.bits = new BitSet(config.capacity, config.buffer);
  }

  /**
   * Size the filter for `expectedItems` at `falsePositiveRate`.
   */
  public static forExpectedItems(
    config: FilterSizingConfig,
    hashFamily?: IHashFamily
  ): MembershipFilter {
    const params = calculateOptimalParams(config);
    return new MembershipFilter({ ...params, ...(hashFamily && { hashFamily }) });
  }

  public add(value: string): void {
    for (let i = 0; i < this.hashCount; i++) {
      this.bits.set(this.position(value, i));
    }
  }

  public check(value: string): boolean {
    for (let i = 0; i < this.hashCount; i++) {
      if (!this.bits.get(this.position(value, i))) {
        return false;
      }
    }
    return true;
  }

  /**
   * Theoretical false-positive rate after `itemCount` distinct adds.
   */
  public expectedFalsePositiveRate(itemCount: number): number {
    return falsePositiveRate(this.capacity, this.hashCount, itemCount);
  }

  /**
   * Whether `position` is set. Exposed for inspection, not for membership.
   */
  public isBitSet(position: number): boolean {
    return this.bits.get(position);
  }

  public get buffer(): ArrayBufferLike {
    return this.bits.buffer;
  }

  public getStats(): MembershipFilterStats {
    const setBits = this.bits.count();
    return {
      capacity: this.capacity,
      hashCount: this.hashCount,
      hashWidth: this.hashFamily.width,
      byteSize: this.bits.byteSize,
      setBits,
      fillRatio: setBits / this.capacity,
    };
  }

  private position(value: string, index: number): number {
    return Number(this.hashFamily.hash(value, index) % this.modulus);
  }
}
