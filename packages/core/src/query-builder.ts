/**
 * QueryBuilder
 *
 * Facade over one dialect's statement and schema builders. Every statement
 * is built against a fresh params collection (unless the caller passes
 * one), logged at debug level and announced through a `build` event.
 * Failures are logged, announced through `error`, and rethrown.
 *
 * @example
 * ```typescript
 * import '@sqlweave/mysql/register';
 *
 * const qb = QueryBuilder.for('mysql', { logger: createConsoleLogger() });
 * const { sql, params } = qb.build(new Query().from('users').where({ id: 5 }));
 * // SELECT * FROM `users` WHERE `id`=:qp0   { ':qp0': 5 }
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import { createDialect } from './dialect/dialect-registry';
import { Query } from './query/query';
import { truncateSql } from './utils/logger';

import type { SQLDialect } from './dialect/sql-dialect';
import type { ConditionInput } from './query/condition';
import type { StatementBuilder } from './query/statement-builder';
import type { ColumnList, ColumnValues, QuerySpec } from './query/types';
import type {
  ColumnDefinitions,
  ForeignKeyOptions,
  SchemaStatementBuilder,
} from './schema/schema-statement-builder';
import type { BoundParams, BuiltStatement, Logger, QueryValue } from './types';

export interface QueryBuilderOptions {
  logger?: Logger;
}

export type StatementKind =
  | 'select'
  | 'insert'
  | 'update'
  | 'delete'
  | 'batchInsert'
  | 'resetSequence'
  | 'checkIntegrity'
  | 'ddl';

export interface BuildEvent {
  kind: StatementKind;
  sql: string;
  params: BoundParams;
}

export interface BuildErrorEvent {
  kind: StatementKind;
  error: unknown;
}

export interface QueryBuilderEvents {
  build: (event: BuildEvent) => void;
  error: (event: BuildErrorEvent) => void;
}

export class QueryBuilder extends EventEmitter<QueryBuilderEvents> {
  protected logger?: Logger;
  protected readonly statements: StatementBuilder;
  protected readonly schema: SchemaStatementBuilder;

  constructor(
    readonly dialect: SQLDialect,
    options: QueryBuilderOptions = {},
  ) {
    super();
    if (options.logger) {
      this.logger = options.logger;
    }
    this.statements = dialect.createStatementBuilder();
    this.schema = dialect.createSchemaBuilder();
  }

  /**
   * Create a builder for a registered dialect name
   */
  static for(dialect: string, options: QueryBuilderOptions = {}): QueryBuilder {
    return new QueryBuilder(createDialect(dialect), options);
  }

  // ============ DML ============

  build(query: Query | QuerySpec): BuiltStatement {
    const spec = query instanceof Query ? query.toSpec() : query;
    return this.run('select', () => this.statements.build(spec));
  }

  insert(table: string, columns: ColumnValues, params: BoundParams = {}): BuiltStatement {
    return this.run('insert', () => ({
      sql: this.statements.insert(table, columns, params),
      params,
    }));
  }

  update(
    table: string,
    columns: ColumnValues,
    condition: ConditionInput = '',
    params: BoundParams = {},
  ): BuiltStatement {
    return this.run('update', () => ({
      sql: this.statements.update(table, columns, condition, params),
      params,
    }));
  }

  delete(table: string, condition: ConditionInput = '', params: BoundParams = {}): BuiltStatement {
    return this.run('delete', () => ({
      sql: this.statements.delete(table, condition, params),
      params,
    }));
  }

  batchInsert(
    table: string,
    columns: readonly string[],
    rows: ReadonlyArray<readonly QueryValue[]>,
    params: BoundParams = {},
  ): BuiltStatement {
    return this.run('batchInsert', () => ({
      sql: this.statements.batchInsert(table, columns, rows, params),
      params,
    }));
  }

  resetSequence(table: string, value?: number): string {
    return this.text('resetSequence', () => this.statements.resetSequence(table, value));
  }

  checkIntegrity(check = true, schema = '', table = ''): string {
    return this.text('checkIntegrity', () => this.statements.checkIntegrity(check, schema, table));
  }

  // ============ DDL ============

  getColumnType(type: string): string {
    return this.schema.getColumnType(type);
  }

  createTable(table: string, columns: ColumnDefinitions, options?: string | null): string {
    return this.text('ddl', () => this.schema.createTable(table, columns, options));
  }

  renameTable(table: string, newName: string): string {
    return this.text('ddl', () => this.schema.renameTable(table, newName));
  }

  dropTable(table: string): string {
    return this.text('ddl', () => this.schema.dropTable(table));
  }

  truncateTable(table: string): string {
    return this.text('ddl', () => this.schema.truncateTable(table));
  }

  addColumn(table: string, column: string, type: string): string {
    return this.text('ddl', () => this.schema.addColumn(table, column, type));
  }

  dropColumn(table: string, column: string): string {
    return this.text('ddl', () => this.schema.dropColumn(table, column));
  }

  renameColumn(table: string, oldName: string, newName: string): string {
    return this.text('ddl', () => this.schema.renameColumn(table, oldName, newName));
  }

  alterColumn(table: string, column: string, type: string): string {
    return this.text('ddl', () => this.schema.alterColumn(table, column, type));
  }

  addPrimaryKey(name: string, table: string, columns: ColumnList): string {
    return this.text('ddl', () => this.schema.addPrimaryKey(name, table, columns));
  }

  dropPrimaryKey(name: string, table: string): string {
    return this.text('ddl', () => this.schema.dropPrimaryKey(name, table));
  }

  addForeignKey(
    name: string,
    table: string,
    columns: ColumnList,
    refTable: string,
    refColumns: ColumnList,
    options: ForeignKeyOptions = {},
  ): string {
    return this.text('ddl', () =>
      this.schema.addForeignKey(name, table, columns, refTable, refColumns, options),
    );
  }

  dropForeignKey(name: string, table: string): string {
    return this.text('ddl', () => this.schema.dropForeignKey(name, table));
  }

  createIndex(name: string, table: string, columns: ColumnList, unique = false): string {
    return this.text('ddl', () => this.schema.createIndex(name, table, columns, unique));
  }

  dropIndex(name: string, table: string): string {
    return this.text('ddl', () => this.schema.dropIndex(name, table));
  }

  // ============ Internals ============

  private text(kind: StatementKind, build: () => string): string {
    return this.run(kind, () => ({ sql: build(), params: {} })).sql;
  }

  private run(kind: StatementKind, build: () => BuiltStatement): BuiltStatement {
    let statement: BuiltStatement;
    try {
      statement = build();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.error(`Failed to build ${kind} statement: ${message}`, { error });
      this.emit('error', { kind, error });
      throw error;
    }

    this.logger?.debug(`Built ${kind} statement: ${truncateSql(statement.sql)}`, {
      params: statement.params,
    });
    this.emit('build', { kind, sql: statement.sql, params: statement.params });
    return statement;
  }
}
