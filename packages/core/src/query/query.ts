/**
 * Query
 *
 * Fluent builder producing a QuerySpec. Holds no dialect; hand the result
 * to a StatementBuilder (or the QueryBuilder facade) to get SQL.
 *
 * @example
 * ```typescript
 * const spec = new Query()
 *   .select('id, name')
 *   .from('users u')
 *   .leftJoin('posts p', 'p.user_id = u.id')
 *   .where({ status: 1 })
 *   .andWhere(['like', 'name', 'jo%'])
 *   .orderBy('id DESC')
 *   .limit(10)
 *   .toSpec();
 * ```
 */

import { SORT_ASC, SORT_DESC } from '../constants';
import { isOrderedMap } from '../utils/guards';
import { splitColumns } from './columns';
import { Expression } from './expression';

import type { ConditionInput } from './condition';
import type { ColumnList, JoinSpec, OrderByColumns, QuerySpec, SortDirection } from './types';
import type { BoundParams } from '../types';

export type OrderByInput = string | Expression | OrderByColumns;

type OrderByMap = Map<string, SortDirection | Expression>;

const ORDER_DIRECTION = /^(.*?)\s+(asc|desc)$/i;

export class Query {
  // ============ Selection State ============
  private _select: Array<string | Expression> = [];
  private _distinct = false;
  private _selectOption: string | null = null;
  private _from: string[] = [];

  // ============ Join State ============
  private _joins: Array<JoinSpec | Expression> = [];

  // ============ Condition State ============
  private _where?: ConditionInput;
  private _having?: ConditionInput;

  // ============ Grouping State ============
  private _groupBy: Array<string | Expression> = [];
  private _orderBy: OrderByMap = new Map();
  private _unions: Array<QuerySpec | string> = [];

  // ============ Pagination State ============
  private _limit: number | null = null;
  private _offset: number | null = null;

  private _params: BoundParams = {};

  // ============ Selection Methods ============

  /**
   * Set columns to select. A string is split on commas unless it contains
   * a parenthesis.
   */
  select(columns: ColumnList, option: string | null = null): this {
    this._select = toColumnArray(columns);
    this._selectOption = option;
    return this;
  }

  addSelect(columns: ColumnList): this {
    this._select.push(...toColumnArray(columns));
    return this;
  }

  distinct(value = true): this {
    this._distinct = value;
    return this;
  }

  /**
   * Set the FROM tables. A string is split on commas unless it contains a
   * parenthesis, so a sub-query keeps its own commas.
   */
  from(tables: string | readonly string[]): this {
    this._from = typeof tables === 'string' ? toTableArray(tables) : [...tables];
    return this;
  }

  // ============ Join Methods ============

  join(type: string, table: string, on?: ConditionInput): this {
    this._joins.push(on === undefined ? [type, table] : [type, table, on]);
    return this;
  }

  innerJoin(table: string, on?: ConditionInput): this {
    return this.join('INNER JOIN', table, on);
  }

  leftJoin(table: string, on?: ConditionInput): this {
    return this.join('LEFT JOIN', table, on);
  }

  rightJoin(table: string, on?: ConditionInput): this {
    return this.join('RIGHT JOIN', table, on);
  }

  /**
   * Raw join fragment, e.g. a lateral join the tuple form cannot express
   */
  joinRaw(expression: Expression): this {
    this._joins.push(expression);
    return this;
  }

  // ============ WHERE Methods ============

  where(condition: ConditionInput, params: BoundParams = {}): this {
    this._where = condition;
    return this.addParams(params);
  }

  andWhere(condition: ConditionInput, params: BoundParams = {}): this {
    this._where = this._where === undefined ? condition : ['and', this._where, condition];
    return this.addParams(params);
  }

  orWhere(condition: ConditionInput, params: BoundParams = {}): this {
    this._where = this._where === undefined ? condition : ['or', this._where, condition];
    return this.addParams(params);
  }

  // ============ Grouping Methods ============

  groupBy(columns: ColumnList): this {
    this._groupBy = toColumnArray(columns);
    return this;
  }

  addGroupBy(columns: ColumnList): this {
    this._groupBy.push(...toColumnArray(columns));
    return this;
  }

  having(condition: ConditionInput, params: BoundParams = {}): this {
    this._having = condition;
    return this.addParams(params);
  }

  andHaving(condition: ConditionInput, params: BoundParams = {}): this {
    this._having = this._having === undefined ? condition : ['and', this._having, condition];
    return this.addParams(params);
  }

  orHaving(condition: ConditionInput, params: BoundParams = {}): this {
    this._having = this._having === undefined ? condition : ['or', this._having, condition];
    return this.addParams(params);
  }

  union(query: Query | QuerySpec | string): this {
    this._unions.push(query instanceof Query ? query.toSpec() : query);
    return this;
  }

  // ============ Ordering Methods ============

  /**
   * Replace the ORDER BY columns. Accepts 'id DESC, name', a column to
   * direction object or Map, or an Expression. A string containing a
   * parenthesis is taken as one expression.
   */
  orderBy(columns: OrderByInput): this {
    this._orderBy = normalizeOrderBy(columns);
    return this;
  }

  addOrderBy(columns: OrderByInput): this {
    this._orderBy = new Map([...this._orderBy, ...normalizeOrderBy(columns)]);
    return this;
  }

  // ============ Pagination Methods ============

  limit(limit: number | null): this {
    this._limit = limit;
    return this;
  }

  offset(offset: number | null): this {
    this._offset = offset;
    return this;
  }

  // ============ Params ============

  params(params: BoundParams): this {
    this._params = { ...params };
    return this;
  }

  addParams(params: BoundParams): this {
    Object.assign(this._params, params);
    return this;
  }

  /**
   * Snapshot of the current state. The params collection is a copy, so one
   * Query can be built several times.
   */
  toSpec(): QuerySpec {
    return {
      select: [...this._select],
      distinct: this._distinct,
      selectOption: this._selectOption,
      from: [...this._from],
      join: [...this._joins],
      where: this._where,
      groupBy: [...this._groupBy],
      having: this._having,
      union: [...this._unions],
      orderBy: new Map(this._orderBy),
      limit: this._limit,
      offset: this._offset,
      params: { ...this._params },
    };
  }
}

function toColumnArray(columns: ColumnList): Array<string | Expression> {
  if (typeof columns !== 'string') {
    return [...columns];
  }
  return columns.includes('(') ? [columns.trim()] : splitColumns(columns);
}

function toTableArray(tables: string): string[] {
  return tables.includes('(') ? [tables.trim()] : splitColumns(tables);
}

function normalizeOrderBy(columns: OrderByInput): OrderByMap {
  if (columns instanceof Expression) {
    return new Map([[columns.text, columns]]);
  }
  if (typeof columns !== 'string') {
    if (isOrderedMap(columns)) {
      return new Map(columns);
    }
    return new Map(Object.entries(columns));
  }
  if (columns.includes('(')) {
    const text = columns.trim();
    return new Map([[text, new Expression(text)]]);
  }

  const result: OrderByMap = new Map();
  for (const column of splitColumns(columns)) {
    const match = ORDER_DIRECTION.exec(column);
    if (match) {
      const [, name = '', direction = ''] = match;
      result.set(name, direction.toUpperCase() === SORT_DESC ? SORT_DESC : SORT_ASC);
    } else {
      result.set(column, SORT_ASC);
    }
  }
  return result;
}
