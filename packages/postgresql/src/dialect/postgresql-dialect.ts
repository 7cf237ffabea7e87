/**
 * PostgreSQL Dialect Implementation
 *
 * Handles PostgreSQL-specific SQL syntax:
 * - Double-quote (") identifier quoting
 * - PostgreSQL physical column types (serial, bytea, timestamp(0)...)
 * - Batch insert and sequence reset
 */

import { BASE_DIALECT_CONFIG, SQLDialect } from '@sqlweave/core';

import { PostgreSQLStatementBuilder } from '../query-builder/postgresql-statement-builder';
import { PostgreSQLSchemaBuilder } from '../schema/postgresql-schema-builder';

import type { DialectConfig, TypeMap } from '@sqlweave/core';

export const POSTGRESQL_TYPE_MAP: TypeMap = {
  pk: 'serial NOT NULL PRIMARY KEY',
  bigpk: 'bigserial NOT NULL PRIMARY KEY',
  string: 'varchar(255)',
  text: 'text',
  smallint: 'smallint',
  integer: 'integer',
  bigint: 'bigint',
  float: 'double precision',
  decimal: 'numeric(10,0)',
  datetime: 'timestamp(0)',
  timestamp: 'timestamp(0)',
  time: 'time(0)',
  date: 'date',
  binary: 'bytea',
  boolean: 'boolean',
  money: 'numeric(19,4)',
};

export class PostgreSQLDialect extends SQLDialect {
  readonly name = 'postgresql';

  readonly config: DialectConfig = {
    ...BASE_DIALECT_CONFIG,
    identifierQuote: '"',
    typeMap: POSTGRESQL_TYPE_MAP,
  };

  override createStatementBuilder(): PostgreSQLStatementBuilder {
    return new PostgreSQLStatementBuilder(this);
  }

  override createSchemaBuilder(): PostgreSQLSchemaBuilder {
    return new PostgreSQLSchemaBuilder(this);
  }
}
