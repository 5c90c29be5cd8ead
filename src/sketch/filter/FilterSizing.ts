import { ConfigurationError } from '../../common/Errors';
import { FilterSizingConfig } from './IMembershipFilter';

export interface FilterParams {
  capacity: number;
  hashCount: number;
}

/**
 * Optimal bit count and probe count for `expectedItems` at the target rate:
 * m = -n ln(p) / (ln 2)^2, k = (m / n) ln 2.
 */
export function calculateOptimalParams(config: FilterSizingConfig): FilterParams {
  const { expectedItems, falsePositiveRate } = config;

  if (!Number.isFinite(expectedItems) || expectedItems <= 0) {
    throw new ConfigurationError(`expectedItems must be positive, got ${expectedItems}`);
  }
  if (!(falsePositiveRate > 0 && falsePositiveRate < 1)) {
    throw new ConfigurationError(
      `falsePositiveRate must be between 0 and 1, got ${falsePositiveRate}`
    );
  }

  const capacity = Math.ceil(-(expectedItems * Math.log(falsePositiveRate)) / (Math.LN2 * Math.LN2));
  const hashCount = Math.max(1, Math.round((capacity / expectedItems) * Math.LN2));

  return { capacity, hashCount };
}

/**
 * Probability that a value never added is reported present after
 * `itemCount` distinct adds: (1 - e^(-kn/m))^k.
 */
export function falsePositiveRate(capacity: number, hashCount: number, itemCount: number): number {
  return Math.pow(1 - Math.exp((-hashCount * itemCount) / capacity), hashCount);
}
