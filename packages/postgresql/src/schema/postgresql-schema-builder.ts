import { SchemaStatementBuilder } from '@sqlweave/core';

export class PostgreSQLSchemaBuilder extends SchemaStatementBuilder {
  override renameTable(table: string, newName: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} RENAME TO ${this.dialect.quoteTableName(newName)}`;
  }

  override alterColumn(table: string, column: string, type: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} ALTER COLUMN ${this.dialect.quoteColumnName(column)} TYPE ${this.getColumnType(type)}`;
  }

  /**
   * Index names are schema-wide in PostgreSQL
   */
  override dropIndex(name: string, _table: string): string {
    return `DROP INDEX ${this.dialect.quoteTableName(name)}`;
  }
}
