/**
 * Parameter Binder
 *
 * Generates placeholder tokens as `prefix + size(params)` and records the
 * bound value under that token. Every literal that reaches SQL text goes
 * through here, except Expression fragments, whose own params are merged.
 */

import { QUERY_DEFAULTS } from '../constants';
import { Expression } from '../query/expression';

import type { BoundParams } from '../types';

export class ParameterBinder {
  constructor(readonly prefix: string = QUERY_DEFAULTS.PARAM_PREFIX) {}

  /**
   * Bind a value and return its placeholder
   */
  bind(params: BoundParams, value: unknown): string {
    const name = `${this.prefix}${Object.keys(params).length}`;
    params[name] = value;
    return name;
  }

  /**
   * Merge an expression's params and return its text
   */
  merge(params: BoundParams, expression: Expression): string {
    Object.assign(params, expression.params);
    return expression.text;
  }

  /**
   * SQL text for a value position: inlined expression or a fresh placeholder
   */
  placeholder(params: BoundParams, value: unknown): string {
    return value instanceof Expression ? this.merge(params, value) : this.bind(params, value);
  }
}
