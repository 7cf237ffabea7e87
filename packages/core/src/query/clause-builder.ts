/**
 * Clause Builder
 *
 * One method per SELECT clause. Each returns the clause text, or an empty
 * string when the clause does not apply.
 *
 * @see statement-builder.ts - assembles the clauses in order
 */

import { SORT_DESC } from '../constants';
import { MalformedJoinError } from '../errors';
import { isCount, isList, isOrderedMap } from '../utils/guards';
import { quoteColumnList } from './columns';
import { Expression } from './expression';

import type { ConditionCompiler } from './condition-compiler';
import type { ConditionInput } from './condition';
import type { ColumnList, JoinSpec, OrderByColumns, QuerySpec } from './types';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { ParameterBinder } from '../params/parameter-binder';
import type { BoundParams } from '../types';

/** 'expr AS alias' or 'expr alias' in a select list */
const ALIASED_COLUMN = /^(.*?)(?:\s+as\s+|\s+)([\w\-.]+)$/i;
/** 'table AS alias' or 'table alias' in FROM / JOIN */
const ALIASED_TABLE = /^(.*?)(?:\s+as\s+|\s+)(.*)$/i;

export type SubQueryCompiler = (query: QuerySpec, params: BoundParams) => string;

export class ClauseBuilder {
  constructor(
    protected readonly dialect: SQLDialect,
    protected readonly conditions: ConditionCompiler,
    protected readonly binder: ParameterBinder,
  ) {}

  buildSelect(
    columns: ReadonlyArray<string | Expression> = [],
    distinct = false,
    selectOption: string | null = null,
    params: BoundParams = {},
  ): string {
    let select = distinct ? 'SELECT DISTINCT' : 'SELECT';
    if (selectOption !== null) {
      select += ` ${selectOption}`;
    }

    if (columns.length === 0) {
      return `${select} *`;
    }

    const list = columns.map((column) => {
      if (column instanceof Expression) {
        return this.binder.merge(params, column);
      }
      if (column.includes('(')) {
        return column;
      }
      const aliased = ALIASED_COLUMN.exec(column);
      if (aliased) {
        const [, expression = '', alias = ''] = aliased;
        return `${this.dialect.quoteColumnName(expression)} AS ${this.dialect.quoteColumnName(alias)}`;
      }
      return this.dialect.quoteColumnName(column);
    });

    return `${select} ${list.join(', ')}`;
  }

  buildFrom(tables: readonly string[] = []): string {
    if (tables.length === 0) {
      return '';
    }
    return `FROM ${tables.map((table) => this.quoteTable(table)).join(', ')}`;
  }

  buildJoin(joins: ReadonlyArray<JoinSpec | Expression> = [], params: BoundParams = {}): string {
    if (joins.length === 0) {
      return '';
    }

    const clauses = joins.map((join, index) => {
      if (join instanceof Expression) {
        return this.binder.merge(params, join);
      }
      if (!isList(join) || typeof join[0] !== 'string' || typeof join[1] !== 'string') {
        throw new MalformedJoinError(index);
      }

      const [type, table, condition] = join;
      let clause = `${type} ${this.quoteTable(table)}`;
      if (condition !== undefined) {
        const on = this.conditions.compile(condition, params);
        if (on !== '') {
          clause += ` ON ${on}`;
        }
      }
      return clause;
    });

    return clauses.join(this.dialect.config.separator);
  }

  buildWhere(condition: ConditionInput | undefined, params: BoundParams): string {
    const where = condition === undefined ? '' : this.conditions.compile(condition, params);
    return where === '' ? '' : `WHERE ${where}`;
  }

  buildGroupBy(columns: ColumnList | undefined, params: BoundParams = {}): string {
    if (columns === undefined || columns.length === 0) {
      return '';
    }
    return `GROUP BY ${quoteColumnList(this.dialect, columns, this.binder, params)}`;
  }

  buildHaving(condition: ConditionInput | undefined, params: BoundParams): string {
    const having = condition === undefined ? '' : this.conditions.compile(condition, params);
    return having === '' ? '' : `HAVING ${having}`;
  }

  buildOrderBy(columns: OrderByColumns = {}, params: BoundParams = {}): string {
    const entries = isOrderedMap(columns) ? [...columns] : Object.entries(columns);
    const orders = entries.map(([name, direction]) => {
      if (direction instanceof Expression) {
        return this.binder.merge(params, direction);
      }
      return `${this.dialect.quoteColumnName(name)}${direction === SORT_DESC ? ' DESC' : ''}`;
    });

    return orders.length === 0 ? '' : `ORDER BY ${orders.join(', ')}`;
  }

  buildLimit(limit?: number | null, offset?: number | null): string {
    let sql = '';
    if (isCount(limit) && limit >= 0) {
      sql = `LIMIT ${Math.trunc(limit)}`;
    }
    if (isCount(offset) && offset > 0) {
      sql += ` OFFSET ${Math.trunc(offset)}`;
    }
    return sql.trimStart();
  }

  /**
   * Sub-queries are compiled against the ambient params so their
   * placeholders continue the same sequence
   */
  buildUnion(
    unions: ReadonlyArray<QuerySpec | string> = [],
    params: BoundParams,
    compile: SubQueryCompiler,
  ): string {
    if (unions.length === 0) {
      return '';
    }
    const parts = unions.map((union) => (typeof union === 'string' ? union : compile(union, params)));
    return `UNION (\n${parts.join('\n) UNION (\n')}\n)`;
  }

  protected quoteTable(table: string): string {
    if (table.includes('(')) {
      return table;
    }
    const aliased = ALIASED_TABLE.exec(table);
    if (aliased) {
      const [, name = '', alias = ''] = aliased;
      return `${this.dialect.quoteTableName(name)} ${this.dialect.quoteTableName(alias)}`;
    }
    return this.dialect.quoteTableName(table);
  }
}
