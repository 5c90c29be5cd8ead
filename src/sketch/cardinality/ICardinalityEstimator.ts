import { IHashFamily } from '../../hashing';

export interface ICardinalityEstimator {
  add(value: string): void;
  estimate(): number;
}

export interface CardinalityEstimatorConfig {
  bucketBits: number;
  hashFamily?: IHashFamily;
  hashIndex?: number;
  buffer?: ArrayBufferLike;
}

/**
 * Which correction produced the final estimate.
 *
 * - linear-counting: raw estimate <= 2.5 m and some buckets still empty
 * - large-range: raw estimate above 2^W / 30
 * - raw: the harmonic-mean estimate as is
 */
export type EstimateRegime = 'linear-counting' | 'raw' | 'large-range';

export interface CardinalityEstimate {
  readonly estimate: number;
  readonly rawEstimate: number;
  readonly regime: EstimateRegime;
  readonly zeroBuckets: number;
}

export interface CardinalityEstimatorStats {
  readonly bucketBits: number;
  readonly bucketCount: number;
  readonly hashWidth: number;
  readonly maxRank: number;
  readonly byteSize: number;
}
