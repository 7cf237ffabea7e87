export { PostgreSQLDialect, POSTGRESQL_TYPE_MAP } from './dialect/postgresql-dialect';
export { PostgreSQLStatementBuilder } from './query-builder/postgresql-statement-builder';
export { PostgreSQLSchemaBuilder } from './schema/postgresql-schema-builder';

// Re-export core types
export type { BuiltStatement, BoundParams, QueryValue, DialectConfig } from '@sqlweave/core';
