/**
 * MySQL Dialect Implementation
 *
 * Handles MySQL-specific SQL syntax:
 * - Backtick (`) identifier quoting
 * - MySQL physical column types
 * - Batch insert, AUTO_INCREMENT reset and FOREIGN_KEY_CHECKS toggling
 */

import { BASE_DIALECT_CONFIG, SQLDialect } from '@sqlweave/core';

import { MySQLStatementBuilder } from '../query-builder/mysql-statement-builder';
import { MySQLSchemaBuilder } from '../schema/mysql-schema-builder';

import type { DialectConfig, TypeMap } from '@sqlweave/core';

export const MYSQL_TYPE_MAP: TypeMap = {
  pk: 'int(11) NOT NULL AUTO_INCREMENT PRIMARY KEY',
  bigpk: 'bigint(20) NOT NULL AUTO_INCREMENT PRIMARY KEY',
  string: 'varchar(255)',
  text: 'text',
  smallint: 'smallint(6)',
  integer: 'int(11)',
  bigint: 'bigint(20)',
  float: 'float',
  decimal: 'decimal(10,0)',
  datetime: 'datetime',
  timestamp: 'timestamp',
  time: 'time',
  date: 'date',
  binary: 'blob',
  boolean: 'tinyint(1)',
  money: 'decimal(19,4)',
};

export class MySQLDialect extends SQLDialect {
  readonly name = 'mysql';

  readonly config: DialectConfig = {
    ...BASE_DIALECT_CONFIG,
    identifierQuote: '`',
    typeMap: MYSQL_TYPE_MAP,
  };

  override createStatementBuilder(): MySQLStatementBuilder {
    return new MySQLStatementBuilder(this);
  }

  override createSchemaBuilder(): MySQLSchemaBuilder {
    return new MySQLSchemaBuilder(this);
  }
}
