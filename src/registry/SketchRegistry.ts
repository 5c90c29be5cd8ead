/**
 * SketchRegistry - named filter and estimator instances
 *
 * The registry owns its sketches; callers get them by name. Each server or
 * test builds its own registry, there is no process-wide instance.
 */

import { DuplicateSketchError, UnknownSketchError } from '../common/Errors';
import { MembershipFilter } from '../sketch/filter';
import { CardinalityEstimator } from '../sketch/cardinality';
import {
  EstimatorOptions,
  EstimatorSummary,
  FilterOptions,
  FilterSummary,
  ISketchFactory,
  ISketchRegistry,
  SizedFilterOptions,
} from '../interfaces/Sketch';

const FILTER = 'filter';
const ESTIMATOR = 'estimator';

function isSized(options: FilterOptions | SizedFilterOptions): options is SizedFilterOptions {
  return 'expectedItems' in options && 'falsePositiveRate' in options;
}

export class SketchRegistry implements ISketchRegistry {
  private readonly filters = new Map<string, MembershipFilter>();
  private readonly estimators = new Map<string, CardinalityEstimator>();
  private readonly factory: ISketchFactory;

  constructor(factory: ISketchFactory) {
    this.factory = factory;
  }

  createFilter(name: string, options: FilterOptions | SizedFilterOptions = {}): MembershipFilter {
    if (this.filters.has(name)) {
      throw new DuplicateSketchError(FILTER, name);
    }
    const filter = isSized(options)
      ? this.factory.createSizedFilter(options)
      : this.factory.createFilter(options);
    this.filters.set(name, filter);
    return filter;
  }

  getFilter(name: string): MembershipFilter {
    const filter = this.filters.get(name);
    if (!filter) {
      throw new UnknownSketchError(FILTER, name);
    }
    return filter;
  }

  deleteFilter(name: string): void {
    if (!this.filters.delete(name)) {
      throw new UnknownSketchError(FILTER, name);
    }
  }

  listFilters(): FilterSummary[] {
    return [...this.filters.entries()].map(([name, filter]) => ({ name, ...filter.getStats() }));
  }

  createEstimator(name: string, options: EstimatorOptions = {}): CardinalityEstimator {
    if (this.estimators.has(name)) {
      throw new DuplicateSketchError(ESTIMATOR, name);
    }
    const estimator = this.factory.createEstimator(options);
    this.estimators.set(name, estimator);
    return estimator;
  }

  getEstimator(name: string): CardinalityEstimator {
    const estimator = this.estimators.get(name);
    if (!estimator) {
      throw new UnknownSketchError(ESTIMATOR, name);
    }
    return estimator;
  }

  deleteEstimator(name: string): void {
    if (!this.estimators.delete(name)) {
      throw new UnknownSketchError(ESTIMATOR, name);
    }
  }

  listEstimators(): EstimatorSummary[] {
    return [...this.estimators.entries()].map(([name, estimator]) =>
      SketchRegistry.summarize(name, estimator)
    );
  }

  static summarize(name: string, estimator: CardinalityEstimator): EstimatorSummary {
    return { name, ...estimator.getStats(), result: estimator.explain() };
  }
}
