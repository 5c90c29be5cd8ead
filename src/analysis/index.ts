export type { PasswordStatus, PasswordCheckResult } from './PasswordUniqueness';
export type { CountResult, ComparisonReport } from './CountComparison';

export { checkPasswordUniqueness, isValidPassword } from './PasswordUniqueness';
export { extractIpAddress, loadIpAddresses } from './LogLoader';
export {
  countUniqueExact,
  countUniqueApproximate,
  compareCounts,
  formatComparison,
} from './CountComparison';
