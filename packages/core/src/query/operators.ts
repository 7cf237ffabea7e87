/**
 * Operator tokens accepted as the first element of an operator-form condition.
 */

export const LOGICAL_OPERATORS = ['AND', 'OR'] as const;
export const RANGE_OPERATORS = ['BETWEEN', 'NOT BETWEEN'] as const;
export const MEMBERSHIP_OPERATORS = ['IN', 'NOT IN'] as const;
export const LIKE_OPERATORS = ['LIKE', 'NOT LIKE', 'OR LIKE', 'OR NOT LIKE'] as const;
export const COMPARISON_OPERATORS = ['=', '<>', '!=', '<', '<=', '>', '>='] as const;

export const CONDITION_OPERATORS = [
  ...LOGICAL_OPERATORS,
  ...RANGE_OPERATORS,
  ...MEMBERSHIP_OPERATORS,
  ...LIKE_OPERATORS,
  ...COMPARISON_OPERATORS,
] as const;

export type OperatorKind = (typeof CONDITION_OPERATORS)[number];

/**
 * Match a token case-insensitively, ignoring extra whitespace ('not  in' -> 'NOT IN')
 */
export function parseOperator(token: string): OperatorKind | undefined {
  const normalized = token.trim().replaceAll(/\s+/g, ' ').toUpperCase();
  return CONDITION_OPERATORS.find((operator) => operator === normalized);
}
