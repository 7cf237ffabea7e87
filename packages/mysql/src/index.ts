export { MySQLDialect, MYSQL_TYPE_MAP } from './dialect/mysql-dialect';
export {
  MySQLStatementBuilder,
  MySQLClauseBuilder,
  MYSQL_UNLIMITED,
} from './query-builder/mysql-statement-builder';
export { MySQLSchemaBuilder } from './schema/mysql-schema-builder';

// Re-export core types
export type { BuiltStatement, BoundParams, QueryValue, DialectConfig } from '@sqlweave/core';
