/**
 * Constants
 *
 * Centralized defaults shared by the builders and dialects.
 */

// ============ Query Defaults ============

export const QUERY_DEFAULTS = {
  /** Prefix of generated placeholders (:qp0, :qp1, ...) */
  PARAM_PREFIX: ':qp',
  /** Separator between top-level SELECT clauses and JOIN entries */
  SEPARATOR: ' ',
  /** Maximum SQL length written to the logger */
  LOG_SQL_MAX_LENGTH: 200,
} as const;

// ============ Condition Literals ============

export const CONDITION_LITERALS = {
  /** Predicate no row satisfies, used for IN / LIKE over an empty list */
  ALWAYS_FALSE: '0=1',
  /** Literal emitted for a missing or null value inside an IN list */
  NULL: 'NULL',
} as const;

// ============ Sorting ============

export const SORT_ASC = 'ASC';
export const SORT_DESC = 'DESC';
