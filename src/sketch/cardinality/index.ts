export type {
  ICardinalityEstimator,
  CardinalityEstimatorConfig,
  CardinalityEstimate,
  CardinalityEstimatorStats,
  EstimateRegime,
} from './ICardinalityEstimator';

export { CardinalityEstimator, alphaFor } from './CardinalityEstimator';
