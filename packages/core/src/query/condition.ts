/**
 * Condition Nodes
 *
 * Conditions arrive in three shapes and are normalized into tagged nodes
 * before compilation:
 *
 * - `'status = 1'`                          -> RawSql (verbatim)
 * - `{ status: 1, deleted_at: null }`       -> HashCondition (pairs AND-ed)
 * - `new Map([['2', 1], ['b', 2]])`         -> HashCondition, in insertion order
 * - `['in', 'id', [1, 2, 3]]`               -> OperatorCondition
 *
 * The node classes double as explicit constructors for callers that prefer
 * not to rely on shape detection.
 */

import { UnknownOperatorError } from '../errors';
import { isList, isOrderedMap } from '../utils/guards';
import { parseOperator } from './operators';

import type { Expression } from './expression';
import type { OperatorKind } from './operators';
import type { QueryValue } from '../types';

export type HashValue = QueryValue | Expression | readonly unknown[];

/**
 * Column to value. A plain object lists integer-like keys first; use a
 * HashConditionMap when the pair order matters.
 */
export interface HashConditionInput {
  readonly [column: string]: HashValue;
}

export type HashConditionMap = ReadonlyMap<string, HashValue>;

export type OperatorConditionInput = readonly [operator: string, ...operands: unknown[]];

export type ConditionNode = RawSql | HashCondition | OperatorCondition;

export type ConditionInput =
  | string
  | Expression
  | HashConditionInput
  | HashConditionMap
  | OperatorConditionInput
  | readonly []
  | ConditionNode;

export class RawSql {
  readonly kind = 'raw';

  constructor(readonly sql: string) {}
}

export class HashCondition {
  readonly kind = 'hash';
  readonly entries: ReadonlyArray<readonly [column: string, value: HashValue]>;

  constructor(columns: HashConditionInput | HashConditionMap) {
    this.entries = isOrderedMap(columns) ? [...columns] : Object.entries(columns);
  }
}

export class OperatorCondition {
  readonly kind = 'operator';

  constructor(
    readonly operator: OperatorKind,
    readonly operands: readonly unknown[],
  ) {}
}

export function isConditionNode(value: unknown): value is ConditionNode {
  return (
    value instanceof RawSql || value instanceof HashCondition || value instanceof OperatorCondition
  );
}

/**
 * Normalize an input shape into a node. Expressions are handled by the
 * compiler, since they carry params.
 */
export function toConditionNode(
  condition: Exclude<ConditionInput, Expression>,
): ConditionNode {
  if (typeof condition === 'string') {
    return new RawSql(condition);
  }
  if (isConditionNode(condition)) {
    return condition;
  }
  if (isList(condition)) {
    return fromList(condition);
  }
  return new HashCondition(condition);
}

/**
 * Operator form: first element is the operator token, the rest are operands
 */
export function fromList(condition: readonly unknown[]): ConditionNode {
  if (condition.length === 0) {
    return new RawSql('');
  }
  const [token, ...operands] = condition;
  if (typeof token !== 'string') {
    throw new UnknownOperatorError(String(token));
  }
  const operator = parseOperator(token);
  if (operator === undefined) {
    throw new UnknownOperatorError(token.toUpperCase());
  }
  return new OperatorCondition(operator, operands);
}
