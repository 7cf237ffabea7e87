/**
 * Expression
 *
 * A trusted SQL fragment that is inlined verbatim wherever a value is
 * expected. Its params are merged into the build's collection unchanged,
 * so their names must not collide with generated placeholders.
 *
 * @example
 * ```typescript
 * builder.update('users', { visits: new Expression('visits + 1') }, { id: 7 }, params);
 * // UPDATE `users` SET `visits`=visits + 1 WHERE `id`=:qp0
 * ```
 */

import type { BoundParams } from '../types';

export class Expression {
  readonly params: Readonly<BoundParams>;

  constructor(
    readonly text: string,
    params: BoundParams = {},
  ) {
    this.params = { ...params };
  }

  toString(): string {
    return this.text;
  }
}

export function raw(text: string, params: BoundParams = {}): Expression {
  return new Expression(text, params);
}
