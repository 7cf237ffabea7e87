/**
 * Schema Statement Builder
 * DDL generation: tables, columns, keys and indexes
 *
 * Every name goes through the dialect's quoting; column types go through
 * the dialect's TypeMapper. Dialect packages override the statements whose
 * syntax differs.
 */

import { isList } from '../utils/guards';
import { quoteColumnList } from '../query/columns';
import { TypeMapper } from './type-mapper';

import type { SQLDialect } from '../dialect/sql-dialect';
import type { ColumnList } from '../query/types';

export type ForeignKeyAction = 'CASCADE' | 'SET NULL' | 'SET DEFAULT' | 'RESTRICT' | 'NO ACTION';

export interface ForeignKeyOptions {
  onDelete?: ForeignKeyAction | null;
  onUpdate?: ForeignKeyAction | null;
}

/**
 * Column name to abstract type, or a list mixing `[name, type]` pairs with
 * raw definition strings such as 'PRIMARY KEY (a, b)'
 */
export type ColumnDefinitions =
  | Readonly<Record<string, string>>
  | ReadonlyArray<string | readonly [name: string, type: string]>;

export class SchemaStatementBuilder {
  protected readonly types: TypeMapper;

  constructor(protected readonly dialect: SQLDialect) {
    this.types = new TypeMapper(dialect.config.typeMap);
  }

  getColumnType(type: string): string {
    return this.types.resolve(type);
  }

  createTable(table: string, columns: ColumnDefinitions, options?: string | null): string {
    const definitions = this.columnDefinitions(columns).map((definition) => `\t${definition}`);
    const sql = `CREATE TABLE ${this.dialect.quoteTableName(table)} (\n${definitions.join(',\n')}\n)`;
    return options ? `${sql} ${options}` : sql;
  }

  renameTable(table: string, newName: string): string {
    return `RENAME TABLE ${this.dialect.quoteTableName(table)} TO ${this.dialect.quoteTableName(newName)}`;
  }

  dropTable(table: string): string {
    return `DROP TABLE ${this.dialect.quoteTableName(table)}`;
  }

  truncateTable(table: string): string {
    return `TRUNCATE TABLE ${this.dialect.quoteTableName(table)}`;
  }

  addColumn(table: string, column: string, type: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} ADD ${this.dialect.quoteColumnName(column)} ${this.getColumnType(type)}`;
  }

  dropColumn(table: string, column: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} DROP COLUMN ${this.dialect.quoteColumnName(column)}`;
  }

  renameColumn(table: string, oldName: string, newName: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} RENAME COLUMN ${this.dialect.quoteColumnName(oldName)} TO ${this.dialect.quoteColumnName(newName)}`;
  }

  alterColumn(table: string, column: string, type: string): string {
    const quoted = this.dialect.quoteColumnName(column);
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} CHANGE ${quoted} ${quoted} ${this.getColumnType(type)}`;
  }

  addPrimaryKey(name: string, table: string, columns: ColumnList): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} ADD CONSTRAINT ${this.dialect.quoteColumnName(name)} PRIMARY KEY (${quoteColumnList(this.dialect, columns)})`;
  }

  dropPrimaryKey(name: string, table: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} DROP CONSTRAINT ${this.dialect.quoteColumnName(name)}`;
  }

  addForeignKey(
    name: string,
    table: string,
    columns: ColumnList,
    refTable: string,
    refColumns: ColumnList,
    options: ForeignKeyOptions = {},
  ): string {
    let sql =
      `ALTER TABLE ${this.dialect.quoteTableName(table)} ADD CONSTRAINT ${this.dialect.quoteColumnName(name)}` +
      ` FOREIGN KEY (${quoteColumnList(this.dialect, columns)})` +
      ` REFERENCES ${this.dialect.quoteTableName(refTable)} (${quoteColumnList(this.dialect, refColumns)})`;

    if (options.onDelete) {
      sql += ` ON DELETE ${options.onDelete}`;
    }
    if (options.onUpdate) {
      sql += ` ON UPDATE ${options.onUpdate}`;
    }
    return sql;
  }

  dropForeignKey(name: string, table: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} DROP CONSTRAINT ${this.dialect.quoteColumnName(name)}`;
  }

  createIndex(name: string, table: string, columns: ColumnList, unique = false): string {
    return `${unique ? 'CREATE UNIQUE INDEX ' : 'CREATE INDEX '}${this.dialect.quoteTableName(name)} ON ${this.dialect.quoteTableName(table)} (${quoteColumnList(this.dialect, columns)})`;
  }

  dropIndex(name: string, table: string): string {
    return `DROP INDEX ${this.dialect.quoteTableName(name)} ON ${this.dialect.quoteTableName(table)}`;
  }

  private columnDefinitions(columns: ColumnDefinitions): string[] {
    const entries: ReadonlyArray<string | readonly [string, string]> = isList(columns)
      ? columns
      : Object.entries(columns);
    return entries.map((entry) => {
      if (typeof entry === 'string') {
        return entry;
      }
      const [name, type] = entry;
      return `${this.dialect.quoteColumnName(name)} ${this.getColumnType(type)}`;
    });
  }
}
