/**
 * Query Module
 *
 * - ConditionCompiler: WHERE / HAVING / ON conditions
 * - ClauseBuilder: one SELECT clause at a time
 * - StatementBuilder: SELECT / INSERT / UPDATE / DELETE
 * - Query: fluent QuerySpec builder
 *
 * @module query
 */

export { Expression, raw } from './expression';
export {
  RawSql,
  HashCondition,
  OperatorCondition,
  isConditionNode,
  toConditionNode,
} from './condition';
export type {
  ConditionInput,
  ConditionNode,
  HashConditionInput,
  HashConditionMap,
  HashValue,
  OperatorConditionInput,
} from './condition';
export { CONDITION_OPERATORS, parseOperator } from './operators';
export type { OperatorKind } from './operators';
export { ConditionCompiler } from './condition-compiler';
export type { OperatorHandler } from './condition-compiler';
export { ClauseBuilder } from './clause-builder';
export type { SubQueryCompiler } from './clause-builder';
export { StatementBuilder } from './statement-builder';
export { Query } from './query';
export type { OrderByInput } from './query';
export { splitColumns, quoteColumnList } from './columns';
export type {
  ColumnList,
  ColumnValues,
  JoinSpec,
  OrderByColumns,
  QuerySpec,
  SortDirection,
} from './types';
