import { UnsafeSQLError } from '../types';
import type { SqlSafetyPolicy } from '../types';

export const UNSAFE_SQL_KEYWORDS = ['DROP', 'DELETE', 'UPDATE', 'INSERT', 'ALTER'] as const;

const READ_STATEMENT = /^\s*(SELECT|WITH)\b/i;

/**
 * Denylisted keywords found in the statement under the given policy.
 *
 * - `substring`: any occurrence in the uppercased text, including inside
 *   string literals and identifiers (`updated_at` is rejected).
 * - `statement`: keywords must appear as separate words, and the statement
 *   must open with SELECT or WITH.
 */
export function findUnsafeKeywords(sql: string, policy: SqlSafetyPolicy = 'substring'): string[] {
  if (policy === 'statement') {
    const found: string[] = UNSAFE_SQL_KEYWORDS.filter((keyword) =>
      new RegExp(`\\b${keyword}\\b`, 'i').test(sql)
    );
    if (!READ_STATEMENT.test(sql)) {
      found.unshift('NON_SELECT');
    }
    return found;
  }

  const upper = sql.toUpperCase();
  return UNSAFE_SQL_KEYWORDS.filter((keyword) => upper.includes(keyword));
}

export function isSafeSQL(sql: string, policy: SqlSafetyPolicy = 'substring'): boolean {
  return findUnsafeKeywords(sql, policy).length === 0;
}

/**
 * Throw UnsafeSQLError when the statement fails the policy
 */
export function assertSafeSQL(sql: string, policy: SqlSafetyPolicy = 'substring'): void {
  const keywords = findUnsafeKeywords(sql, policy);
  if (keywords.length > 0) {
    throw new UnsafeSQLError(keywords);
  }
}
