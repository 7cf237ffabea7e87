import { SchemaStatementBuilder } from '@sqlweave/core';

/**
 * MySQL drops keys by kind, not through DROP CONSTRAINT
 */
export class MySQLSchemaBuilder extends SchemaStatementBuilder {
  override dropPrimaryKey(_name: string, table: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} DROP PRIMARY KEY`;
  }

  override dropForeignKey(name: string, table: string): string {
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} DROP FOREIGN KEY ${this.dialect.quoteColumnName(name)}`;
  }
}
