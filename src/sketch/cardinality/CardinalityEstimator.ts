/**
 * CardinalityEstimator - HyperLogLog
 *
 * Each value is hashed once to a W-bit integer x. The low b bits of x pick a
 * bucket, the remaining W - b bits give the rank: one plus the number of
 * leading zeros of the remainder within its field. Each bucket keeps the
 * largest rank it has seen.
 *
 * estimate() combines the buckets with a bias-corrected harmonic mean,
 * then applies linear counting for small cardinalities and the 2^W
 * correction for very large ones. It never mutates state.
 *
 * Over a SharedArrayBuffer, bucket updates use an atomic max
 * (compare-exchange loop) so concurrent adds from workers are not lost.
 */

import { ConfigurationError, IndexError } from '../../common/Errors';
import { requireBucketBits } from '../../common/Config';
import { IHashFamily, Murmur3x64HashFamily, countLeadingZeros } from '../../hashing';
import {
  CardinalityEstimate,
  CardinalityEstimatorConfig,
  CardinalityEstimatorStats,
  ICardinalityEstimator,
} from './ICardinalityEstimator';

const DEFAULT_HASH_INDEX = 0;
const MAX_STORED_RANK = 255;

/**
 * Bias correction constant for `bucketCount` buckets.
 */
export function alphaFor(bucketCount: number): number {
  switch (bucketCount) {
    case 16: return 0.673;
    case 32: return 0.697;
    case 64: return 0.709;
    default: return 0.7213 / (1 + 1.079 / bucketCount);
  }
}

export class CardinalityEstimator implements ICardinalityEstimator {
  private readonly buckets: Uint8Array;
  private readonly shared: boolean;
  private readonly hashFamily: IHashFamily;
  private readonly hashIndex: number;
  private readonly bucketMask: bigint;
  private readonly remainderWidth: number;
  public readonly bucketBits: number;
  public readonly bucketCount: number;

  constructor(config: CardinalityEstimatorConfig) {
    requireBucketBits(config.bucketBits);

    const hashFamily = config.hashFamily ?? new Murmur3x64HashFamily();
    if (hashFamily.width <= config.bucketBits) {
      throw new ConfigurationError(
        `Hash width ${hashFamily.width} must exceed bucketBits ${config.bucketBits}`
      );
    }

    // Ranks are stored one byte per bucket
    const maxRank = hashFamily.width - config.bucketBits + 1;
    if (maxRank > MAX_STORED_RANK) {
      throw new ConfigurationError(
        `Hash width ${hashFamily.width} with bucketBits ${config.bucketBits} allows rank ${maxRank}, above ${MAX_STORED_RANK}`
      );
    }

    const bucketCount = 1 << config.bucketBits;
    if (config.buffer && config.buffer.byteLength !== bucketCount) {
      throw new ConfigurationError(
        `${bucketCount} buckets need a ${bucketCount}-byte buffer, got ${config.buffer.byteLength}`
      );
    }

    this.bucketBits = config.bucketBits;
    this.bucketCount = bucketCount;
    this.hashFamily = hashFamily;
    this.hashIndex = config.hashIndex ?? DEFAULT_HASH_INDEX;
    this.bucketMask = BigInt(bucketCount - 1);
    this.remainderWidth = hashFamily.width - config.bucketBits;
    this.buckets = config.buffer ? new Uint8Array(config.buffer) : new Uint8Array(bucketCount);
    this.shared = typeof SharedArrayBuffer !== 'undefined' && config.buffer instanceof SharedArrayBuffer;
  }

  /**
   * Allocate a zeroed SharedArrayBuffer for an estimator with `bucketBits`.
   */
  public static allocateShared(bucketBits: number): SharedArrayBuffer {
    requireBucketBits(bucketBits);
    return new SharedArrayBuffer(1 << bucketBits);
  }

  public get buffer(): ArrayBufferLike {
    return this.buckets.buffer;
  }

  /**
   * Largest rank a bucket can hold: W - b + 1, reached when the remainder is 0.
   */
  public get maxRank(): number {
    return this.remainderWidth + 1;
  }

  public add(value: string): void {
    const x = this.hashFamily.hash(value, this.hashIndex);
    const bucket = Number(x & this.bucketMask);
    const remainder = x >> BigInt(this.bucketBits);
    this.raise(bucket, this.rank(remainder));
  }

  /**
   * One plus the leading zeros of `remainder` within its W - b bit field.
   */
  public rank(remainder: bigint): number {
    return countLeadingZeros(remainder, this.remainderWidth) + 1;
  }

  public getBucket(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.bucketCount) {
      throw new IndexError(index, this.bucketCount);
    }
    return this.read(index);
  }

  public estimate(): number {
    return this.explain().estimate;
  }

  public explain(): CardinalityEstimate {
    const m = this.bucketCount;
    let sum = 0;
    let zeroBuckets = 0;

    for (let j = 0; j < m; j++) {
      const rank = this.read(j);
      sum += Math.pow(2, -rank);
      if (rank === 0) {
        zeroBuckets++;
      }
    }

    const rawEstimate = (alphaFor(m) * m * m) / sum;

    if (rawEstimate <= 2.5 * m && zeroBuckets > 0) {
      return {
        estimate: m * Math.log(m / zeroBuckets),
        rawEstimate,
        regime: 'linear-counting',
        zeroBuckets,
      };
    }

    const hashSpace = Math.pow(2, this.hashFamily.width);
    if (rawEstimate > hashSpace / 30) {
      // Saturates at the size of the hash space
      const estimate = rawEstimate >= hashSpace
        ? hashSpace
        : -hashSpace * Math.log(1 - rawEstimate / hashSpace);
      return { estimate, rawEstimate, regime: 'large-range', zeroBuckets };
    }

    return { estimate: rawEstimate, rawEstimate, regime: 'raw', zeroBuckets };
  }

  public getStats(): CardinalityEstimatorStats {
    return {
      bucketBits: this.bucketBits,
      bucketCount: this.bucketCount,
      hashWidth: this.hashFamily.width,
      maxRank: this.maxRank,
      byteSize: this.buckets.byteLength,
    };
  }

  private read(index: number): number {
    return this.shared ? Atomics.load(this.buckets, index) : this.buckets[index] ?? 0;
  }

  private raise(index: number, rank: number): void {
    if (!this.shared) {
      if (rank > (this.buckets[index] ?? 0)) {
        this.buckets[index] = rank;
      }
      return;
    }

    let current = Atomics.load(this.buckets, index);
    while (rank > current) {
      const observed = Atomics.compareExchange(this.buckets, index, current, rank);
      if (observed === current) {
        return;
      }
      current = observed;
    }
  }
}
