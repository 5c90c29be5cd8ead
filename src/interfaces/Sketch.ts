import { MembershipFilter, MembershipFilterStats } from '../sketch/filter';
import { CardinalityEstimate, CardinalityEstimator, CardinalityEstimatorStats } from '../sketch/cardinality';

export interface FilterOptions {
  capacity?: number;
  hashCount?: number;
}

export interface SizedFilterOptions {
  expectedItems: number;
  falsePositiveRate: number;
}

export interface EstimatorOptions {
  bucketBits?: number;
}

export interface ISketchFactory {
  createFilter(options?: FilterOptions): MembershipFilter;
  createSizedFilter(options: SizedFilterOptions): MembershipFilter;
  createEstimator(options?: EstimatorOptions): CardinalityEstimator;
}

export interface FilterSummary extends MembershipFilterStats {
  readonly name: string;
}

export interface EstimatorSummary extends CardinalityEstimatorStats {
  readonly name: string;
  readonly result: CardinalityEstimate;
}

export interface ISketchRegistry {
  createFilter(name: string, options?: FilterOptions | SizedFilterOptions): MembershipFilter;
  getFilter(name: string): MembershipFilter;
  deleteFilter(name: string): void;
  listFilters(): FilterSummary[];

  createEstimator(name: string, options?: EstimatorOptions): CardinalityEstimator;
  getEstimator(name: string): CardinalityEstimator;
  deleteEstimator(name: string): void;
  listEstimators(): EstimatorSummary[];
}
