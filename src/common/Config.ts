import { ConfigurationError } from './Errors';

export const MIN_BUCKET_BITS = 4;
export const MAX_BUCKET_BITS = 24;

export interface FilterDefaults {
  capacity: number;
  hashCount: number;
}

export interface EstimatorDefaults {
  bucketBits: number;
}

export interface SketchConfig {
  httpPort: number;
  filter: FilterDefaults;
  estimator: EstimatorDefaults;
}

export interface PartialSketchConfig {
  httpPort?: number;
  filter?: Partial<FilterDefaults>;
  estimator?: Partial<EstimatorDefaults>;
}

export const DEFAULT_FILTER: FilterDefaults = {
  capacity: 1000,
  hashCount: 3,
};

export const DEFAULT_ESTIMATOR: EstimatorDefaults = {
  bucketBits: 10,
};

export const DEFAULT_CONFIG: SketchConfig = {
  httpPort: 3000,
  filter: DEFAULT_FILTER,
  estimator: DEFAULT_ESTIMATOR,
};

export function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

export function requireBucketBits(value: number): void {
  if (!Number.isInteger(value) || value < MIN_BUCKET_BITS || value > MAX_BUCKET_BITS) {
    throw new ConfigurationError(
      `bucketBits must be an integer in [${MIN_BUCKET_BITS}, ${MAX_BUCKET_BITS}], got ${value}`
    );
  }
}

export function resolveSketchConfig(config?: PartialSketchConfig): SketchConfig {
  const resolved: SketchConfig = {
    httpPort: config?.httpPort ?? DEFAULT_CONFIG.httpPort,
    filter: { ...DEFAULT_FILTER, ...config?.filter },
    estimator: { ...DEFAULT_ESTIMATOR, ...config?.estimator },
  };

  if (!Number.isInteger(resolved.httpPort) || resolved.httpPort < 0 || resolved.httpPort > 65535) {
    throw new ConfigurationError(`httpPort must be between 0 and 65535, got ${resolved.httpPort}`);
  }
  requirePositiveInteger('capacity', resolved.filter.capacity);
  requirePositiveInteger('hashCount', resolved.filter.hashCount);
  requireBucketBits(resolved.estimator.bucketBits);

  return resolved;
}
