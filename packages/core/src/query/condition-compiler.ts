/**
 * Condition Compiler
 *
 * Compiles a condition into a boolean SQL fragment, binding
 * every literal through the ParameterBinder. Used for WHERE, HAVING and
 * JOIN ... ON by the clause and statement builders.
 *
 * Supports:
 * - Raw SQL: 'status = 1'
 * - Hash: { status: 1, type: ['a', 'b'], deleted_at: null }, or a Map in pair order
 * - Logical: ['and', cond1, cond2], ['or', cond1, cond2]
 * - Range: ['between', 'age', 18, 65], ['not between', ...]
 * - Membership: ['in', 'id', [1, 2]], ['in', ['a', 'b'], [{ a: 1, b: 2 }]]
 * - Pattern: ['like', 'name', ['%a%', '%b%']], ['or not like', ...]
 * - Comparison: ['>=', 'age', 18]
 *
 * An empty result means "no condition"; callers drop the keyword.
 */

import { CONDITION_LITERALS } from '../constants';
import { OperandCountError, ValidationError } from '../errors';
import { isList, isPlainObject, isStringList } from '../utils/guards';
import { HashCondition, fromList, isConditionNode, toConditionNode } from './condition';
import { Expression } from './expression';

import type { ConditionInput, HashConditionInput, HashConditionMap, HashValue } from './condition';
import type { OperatorKind } from './operators';
import type { IdentifierQuoter } from '../dialect/sql-dialect';
import type { ParameterBinder } from '../params/parameter-binder';
import type { BoundParams } from '../types';

export type OperatorHandler = (
  operator: OperatorKind,
  operands: readonly unknown[],
  params: BoundParams,
) => string;

export class ConditionCompiler {
  private readonly handlers: Readonly<Record<OperatorKind, OperatorHandler>>;

  constructor(
    private readonly quoter: IdentifierQuoter,
    private readonly binder: ParameterBinder,
  ) {
    const logical: OperatorHandler = (op, operands, params) =>
      this.buildLogicalCondition(op, operands, params);
    const range: OperatorHandler = (op, operands, params) =>
      this.buildBetweenCondition(op, operands, params);
    const membership: OperatorHandler = (op, operands, params) =>
      this.buildInCondition(op, operands, params);
    const pattern: OperatorHandler = (op, operands, params) =>
      this.buildLikeCondition(op, operands, params);
    const comparison: OperatorHandler = (op, operands, params) =>
      this.buildComparisonCondition(op, operands, params);

    this.handlers = {
      AND: logical,
      OR: logical,
      BETWEEN: range,
      'NOT BETWEEN': range,
      IN: membership,
      'NOT IN': membership,
      LIKE: pattern,
      'NOT LIKE': pattern,
      'OR LIKE': pattern,
      'OR NOT LIKE': pattern,
      '=': comparison,
      '<>': comparison,
      '!=': comparison,
      '<': comparison,
      '<=': comparison,
      '>': comparison,
      '>=': comparison,
    };
  }

  compile(condition: ConditionInput, params: BoundParams): string {
    if (condition instanceof Expression) {
      return this.binder.merge(params, condition);
    }

    const node = toConditionNode(condition);
    switch (node.kind) {
      case 'raw': {
        return node.sql;
      }
      case 'hash': {
        return this.buildHashCondition(node.entries, params);
      }
      case 'operator': {
        return this.handlers[node.operator](node.operator, node.operands, params);
      }
    }
  }

  private buildHashCondition(
    entries: ReadonlyArray<readonly [string, HashValue]>,
    params: BoundParams,
  ): string {
    const parts = entries.map(([column, value]) => {
      if (isList(value)) {
        return this.buildInCondition('IN', [column, value], params);
      }
      const quoted = this.quoteColumn(column);
      if (value === null || value === undefined) {
        return `${quoted} IS NULL`;
      }
      return `${quoted}=${this.binder.placeholder(params, value)}`;
    });

    if (parts.length <= 1) {
      return parts[0] ?? '';
    }
    return `(${parts.join(') AND (')})`;
  }

  private buildLogicalCondition(
    operator: OperatorKind,
    operands: readonly unknown[],
    params: BoundParams,
  ): string {
    const parts: string[] = [];
    for (const operand of operands) {
      const sql = this.compileOperand(operator, operand, params);
      if (sql !== '') {
        parts.push(sql);
      }
    }

    if (parts.length <= 1) {
      return parts[0] ?? '';
    }
    return `(${parts.join(`) ${operator} (`)})`;
  }

  private buildBetweenCondition(
    operator: OperatorKind,
    operands: readonly unknown[],
    params: BoundParams,
  ): string {
    const [column, from, to] = operands;
    if (isMissing(column) || isMissing(from) || isMissing(to)) {
      throw new OperandCountError(operator, 3);
    }

    const quoted = this.quoteColumn(this.columnName(operator, column));
    const fromPlaceholder = this.binder.placeholder(params, from);
    const toPlaceholder = this.binder.placeholder(params, to);

    return `${quoted} ${operator} ${fromPlaceholder} AND ${toPlaceholder}`;
  }

  private buildInCondition(
    operator: OperatorKind,
    operands: readonly unknown[],
    params: BoundParams,
  ): string {
    const [column, rawValues] = operands;
    if (isMissing(column) || isMissing(rawValues)) {
      throw new OperandCountError(operator, 2);
    }

    const values = isList(rawValues) ? rawValues : [rawValues];
    const columns = this.columnNames(operator, column);

    if (values.length === 0 || columns.length === 0) {
      return operator === 'IN' ? CONDITION_LITERALS.ALWAYS_FALSE : '';
    }

    if (columns.length > 1) {
      return this.buildCompositeInCondition(operator, columns, values, params);
    }

    const name = columns[0] ?? '';
    const items = values.map((value) => {
      const item = isPlainObject(value) ? value[name] : value;
      return this.valueSql(item, params);
    });
    const quoted = this.quoteColumn(name);

    if (items.length === 1) {
      return `${quoted}${operator === 'IN' ? '=' : '<>'}${items[0]}`;
    }
    return `${quoted} ${operator} (${items.join(', ')})`;
  }

  private buildCompositeInCondition(
    operator: OperatorKind,
    columns: readonly string[],
    rows: readonly unknown[],
    params: BoundParams,
  ): string {
    const tuples = rows.map((row) => {
      const values = isPlainObject(row) ? row : {};
      const items = columns.map((column) => this.valueSql(values[column], params));
      return `(${items.join(', ')})`;
    });
    const quoted = columns.map((column) => this.quoteColumn(column));

    return `(${quoted.join(', ')}) ${operator} (${tuples.join(', ')})`;
  }

  private buildLikeCondition(
    operator: OperatorKind,
    operands: readonly unknown[],
    params: BoundParams,
  ): string {
    const [column, rawPatterns] = operands;
    if (isMissing(column) || isMissing(rawPatterns)) {
      throw new OperandCountError(operator, 2);
    }

    const patterns = isList(rawPatterns) ? rawPatterns : [rawPatterns];
    if (patterns.length === 0) {
      return operator === 'LIKE' || operator === 'OR LIKE' ? CONDITION_LITERALS.ALWAYS_FALSE : '';
    }

    const conjunction = operator === 'LIKE' || operator === 'NOT LIKE' ? ' AND ' : ' OR ';
    const comparison = operator === 'OR NOT LIKE' ? 'NOT LIKE' : operator === 'OR LIKE' ? 'LIKE' : operator;
    const quoted = this.quoteColumn(this.columnName(operator, column));

    return patterns
      .map((pattern) => `${quoted} ${comparison} ${this.binder.placeholder(params, pattern)}`)
      .join(conjunction);
  }

  private buildComparisonCondition(
    operator: OperatorKind,
    operands: readonly unknown[],
    params: BoundParams,
  ): string {
    if (operands.length < 2 || isMissing(operands[0])) {
      throw new OperandCountError(operator, 2);
    }

    const [column, value] = operands;
    const quoted = this.quoteColumn(this.columnName(operator, column));

    if (value === null || value === undefined) {
      if (operator === '=') {
        return `${quoted} IS NULL`;
      }
      if (operator === '<>' || operator === '!=') {
        return `${quoted} IS NOT NULL`;
      }
    }

    return `${quoted}${operator}${this.binder.placeholder(params, value)}`;
  }

  /**
   * Operand of AND / OR: nested conditions are compiled, strings kept as-is
   */
  private compileOperand(operator: OperatorKind, operand: unknown, params: BoundParams): string {
    if (typeof operand === 'string') {
      return operand;
    }
    if (operand instanceof Expression) {
      return this.binder.merge(params, operand);
    }
    if (isConditionNode(operand)) {
      return this.compile(operand, params);
    }
    if (isList(operand)) {
      return this.compile(fromList(operand), params);
    }
    if (isPlainObject(operand)) {
      return this.compile(new HashCondition(toHashInput(operand)), params);
    }
    if (operand instanceof Map) {
      return this.compile(new HashCondition(toHashMap(operand)), params);
    }
    throw new ValidationError(`Operands of '${operator}' must be conditions`, 'operand');
  }

  private valueSql(value: unknown, params: BoundParams): string {
    if (value === null || value === undefined) {
      return CONDITION_LITERALS.NULL;
    }
    return this.binder.placeholder(params, value);
  }

  private columnName(operator: OperatorKind, column: unknown): string {
    if (typeof column !== 'string') {
      throw new ValidationError(`Operator '${operator}' expects a column name`, 'column');
    }
    return column;
  }

  private columnNames(operator: OperatorKind, column: unknown): readonly string[] {
    if (typeof column === 'string') {
      return [column];
    }
    if (isStringList(column)) {
      return column;
    }
    throw new ValidationError(`Operator '${operator}' expects a column name or list`, 'column');
  }

  private quoteColumn(column: string): string {
    return column.includes('(') ? column : this.quoter.quoteColumnName(column);
  }
}

function isMissing(value: unknown): boolean {
  return value === null || value === undefined;
}

function toHashInput(columns: Readonly<Record<string, unknown>>): HashConditionInput {
  const hash: Record<string, HashValue> = {};
  for (const [column, value] of Object.entries(columns)) {
    hash[column] = toHashValue(value);
  }
  return hash;
}

function toHashMap(columns: ReadonlyMap<unknown, unknown>): HashConditionMap {
  const hash = new Map<string, HashValue>();
  columns.forEach((value, column) => {
    hash.set(String(column), toHashValue(value));
  });
  return hash;
}

function toHashValue(value: unknown): HashValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    value instanceof Expression ||
    Buffer.isBuffer(value) ||
    isList(value)
  ) {
    return value;
  }
  if (value === undefined) {
    return null;
  }
  throw new ValidationError('Hash condition values must be scalars, lists, null or expressions', 'value');
}
