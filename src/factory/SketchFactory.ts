/**
 * Sketch Factory - builds filters and estimators from resolved config
 *
 * Options passed per call win over the configured defaults.
 */

import { SketchConfig } from '../common/Config';
import { MembershipFilter } from '../sketch/filter';
import { CardinalityEstimator } from '../sketch/cardinality';
import {
  EstimatorOptions,
  FilterOptions,
  ISketchFactory,
  SizedFilterOptions,
} from '../interfaces/Sketch';

export class DefaultSketchFactory implements ISketchFactory {
  private readonly config: SketchConfig;

  constructor(config: SketchConfig) {
    this.config = config;
  }

  createFilter(options: FilterOptions = {}): MembershipFilter {
    return new MembershipFilter({
      capacity: options.capacity ?? this.config.filter.capacity,
      hashCount: options.hashCount ?? this.config.filter.hashCount,
    });
  }

  createSizedFilter(options: SizedFilterOptions): MembershipFilter {
    return MembershipFilter.forExpectedItems(options);
  }

  createEstimator(options: EstimatorOptions = {}): CardinalityEstimator {
    return new CardinalityEstimator({
      bucketBits: options.bucketBits ?? this.config.estimator.bucketBits,
    });
  }
}
