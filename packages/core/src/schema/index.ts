/**
 * Schema Module
 * DDL generation and abstract column types
 */

export { SchemaStatementBuilder } from './schema-statement-builder';
export type {
  ColumnDefinitions,
  ForeignKeyAction,
  ForeignKeyOptions,
} from './schema-statement-builder';
export { TypeMapper } from './type-mapper';
export type { TypeMap } from './type-mapper';
