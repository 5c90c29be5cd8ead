import { IMembershipFilter } from '../sketch/filter';

export type PasswordStatus = 'invalid' | 'already-used' | 'unique';

export interface PasswordCheckResult {
  readonly password: unknown;
  readonly status: PasswordStatus;
}

export function isValidPassword(password: unknown): password is string {
  return typeof password === 'string' && password.length > 0;
}

/**
 * Check each password against the filter in order.
 *
 * Invalid entries (non-strings, empty strings) never touch the filter.
 * A unique password is added right away, so a repeat later in the same
 * batch reports 'already-used'. A false positive from the filter is also
 * reported as 'already-used'.
 */
export function checkPasswordUniqueness(
  filter: IMembershipFilter,
  passwords: readonly unknown[]
): PasswordCheckResult[] {
  const results: PasswordCheckResult[] = [];

  for (const password of passwords) {
    if (!isValidPassword(password)) {
      results.push({ password, status: 'invalid' });
      continue;
    }

    if (filter.check(password)) {
      results.push({ password, status: 'already-used' });
    } else {
      filter.add(password);
      results.push({ password, status: 'unique' });
    }
  }

  return results;
}
