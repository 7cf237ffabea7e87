/**
 * Statement Builder
 *
 * Assembles SELECT statements from the clause builders in a fixed order and
 * builds INSERT / UPDATE / DELETE directly through the ParameterBinder.
 *
 * Operations that need dialect knowledge (batch insert, sequence reset,
 * integrity check toggling) throw here and are overridden by the dialect
 * packages.
 *
 * @example
 * ```typescript
 * const builder = dialect.createStatementBuilder();
 * const { sql, params } = builder.build({ from: ['users'], where: { id: 1 } });
 * // SELECT * FROM `users` WHERE `id`=:qp0   { ':qp0': 1 }
 * ```
 */

import { UnsupportedByDialectError } from '../errors';
import { ParameterBinder } from '../params/parameter-binder';
import { ClauseBuilder } from './clause-builder';
import { ConditionCompiler } from './condition-compiler';

import type { ConditionInput } from './condition';
import type { ColumnValues, QuerySpec } from './types';
import type { SQLDialect } from '../dialect/sql-dialect';
import type { BoundParams, BuiltStatement, QueryValue } from '../types';

export class StatementBuilder {
  protected readonly binder: ParameterBinder;
  protected readonly conditions: ConditionCompiler;
  protected readonly clauses: ClauseBuilder;

  constructor(protected readonly dialect: SQLDialect) {
    this.binder = new ParameterBinder(dialect.config.paramPrefix);
    this.conditions = new ConditionCompiler(dialect, this.binder);
    this.clauses = this.createClauseBuilder();
  }

  /**
   * Hook for dialects whose clause syntax differs (e.g. LIMIT rules)
   */
  protected createClauseBuilder(): ClauseBuilder {
    return new ClauseBuilder(this.dialect, this.conditions, this.binder);
  }

  /**
   * Build a SELECT statement. The query's own params collection, when given,
   * is appended to in place and returned.
   */
  build(query: QuerySpec): BuiltStatement {
    const params = query.params ?? {};
    const sql = this.compose(query, params);
    return { sql, params };
  }

  /**
   * Compile a SELECT against an existing collection. Used for UNION members,
   * whose own params are merged into the ambient collection first.
   */
  compose(query: QuerySpec, params: BoundParams): string {
    if (query.params && query.params !== params) {
      Object.assign(params, query.params);
    }

    const clauses = [
      this.clauses.buildSelect(query.select, query.distinct, query.selectOption, params),
      this.clauses.buildFrom(query.from),
      this.clauses.buildJoin(query.join, params),
      this.clauses.buildWhere(query.where, params),
      this.clauses.buildGroupBy(query.groupBy, params),
      this.clauses.buildHaving(query.having, params),
      this.clauses.buildUnion(query.union, params, (union, ambient) => this.compose(union, ambient)),
      this.clauses.buildOrderBy(query.orderBy, params),
      this.clauses.buildLimit(query.limit, query.offset),
    ];

    return clauses.filter((clause) => clause !== '').join(this.dialect.config.separator);
  }

  /**
   * Compile a standalone condition, e.g. for a caller assembling its own SQL
   */
  buildCondition(condition: ConditionInput, params: BoundParams = {}): string {
    return this.conditions.compile(condition, params);
  }

  insert(table: string, columns: ColumnValues, params: BoundParams = {}): string {
    const names: string[] = [];
    const placeholders: string[] = [];

    for (const [name, value] of Object.entries(columns)) {
      names.push(this.dialect.quoteColumnName(name));
      placeholders.push(this.binder.placeholder(params, value));
    }

    return `INSERT INTO ${this.dialect.quoteTableName(table)} (${names.join(', ')}) VALUES (${placeholders.join(', ')})`;
  }

  update(
    table: string,
    columns: ColumnValues,
    condition: ConditionInput = '',
    params: BoundParams = {},
  ): string {
    const assignments = Object.entries(columns).map(
      ([name, value]) =>
        `${this.dialect.quoteColumnName(name)}=${this.binder.placeholder(params, value)}`,
    );

    const sql = `UPDATE ${this.dialect.quoteTableName(table)} SET ${assignments.join(', ')}`;
    const where = this.clauses.buildWhere(condition, params);
    return where === '' ? sql : `${sql} ${where}`;
  }

  delete(table: string, condition: ConditionInput = '', params: BoundParams = {}): string {
    const sql = `DELETE FROM ${this.dialect.quoteTableName(table)}`;
    const where = this.clauses.buildWhere(condition, params);
    return where === '' ? sql : `${sql} ${where}`;
  }

  // ============ Dialect capabilities ============

  batchInsert(
    _table: string,
    _columns: readonly string[],
    _rows: ReadonlyArray<readonly QueryValue[]>,
    _params: BoundParams = {},
  ): string {
    throw new UnsupportedByDialectError(this.dialect.name, 'batch insert');
  }

  resetSequence(_table: string, _value?: number): string {
    throw new UnsupportedByDialectError(this.dialect.name, 'resetting sequence');
  }

  checkIntegrity(_check = true, _schema = '', _table = ''): string {
    throw new UnsupportedByDialectError(this.dialect.name, 'enabling/disabling integrity check');
  }

  /**
   * One INSERT carrying every row, each value bound. An empty row set
   * yields an empty string.
   */
  protected buildMultiRowInsert(
    table: string,
    columns: readonly string[],
    rows: ReadonlyArray<readonly QueryValue[]>,
    params: BoundParams,
  ): string {
    if (rows.length === 0) {
      return '';
    }

    const tuples = rows.map((row) => {
      const values = row.map((value) => this.binder.bind(params, value));
      return `(${values.join(', ')})`;
    });
    const names = columns.map((column) => this.dialect.quoteColumnName(column));

    return `INSERT INTO ${this.dialect.quoteTableName(table)} (${names.join(', ')}) VALUES ${tuples.join(', ')}`;
  }
}
