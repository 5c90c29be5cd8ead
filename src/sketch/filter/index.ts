export type {
  IMembershipFilter,
  MembershipFilterConfig,
  FilterSizingConfig,
  MembershipFilterStats,
} from './IMembershipFilter';
export type { FilterParams } from './FilterSizing';

export { MembershipFilter } from './MembershipFilter';
export { calculateOptimalParams, falsePositiveRate } from './FilterSizing';
