import type { ConditionInput } from './condition';
import type { Expression } from './expression';
import type { SORT_ASC, SORT_DESC } from '../constants';
import type { BoundParams, QueryValue } from '../types';

export type SortDirection = typeof SORT_ASC | typeof SORT_DESC;

/**
 * [join type, table (optionally aliased), ON condition]
 */
export type JoinSpec = readonly [type: string, table: string, condition?: ConditionInput];

export type ColumnList = string | ReadonlyArray<string | Expression>;

/**
 * Column to direction, in output order. A plain object lists integer-like
 * keys first; a Map keeps insertion order.
 */
export type OrderByColumns =
  | Readonly<Record<string, SortDirection | Expression>>
  | ReadonlyMap<string, SortDirection | Expression>;

/**
 * Abstract SELECT description. Read-only to the builders, except `params`,
 * which is appended to in place.
 */
export interface QuerySpec {
  select?: ReadonlyArray<string | Expression>;
  distinct?: boolean;
  /** Extra keyword(s) after SELECT, e.g. SQL_CALC_FOUND_ROWS */
  selectOption?: string | null;
  from?: readonly string[];
  join?: ReadonlyArray<JoinSpec | Expression>;
  where?: ConditionInput;
  groupBy?: ColumnList;
  having?: ConditionInput;
  union?: ReadonlyArray<QuerySpec | string>;
  orderBy?: OrderByColumns;
  limit?: number | null;
  offset?: number | null;
  params?: BoundParams;
}

/**
 * Column to value for INSERT / UPDATE
 */
export type ColumnValues = Readonly<Record<string, QueryValue | Expression>>;
