import { Expression } from './expression';

import type { ColumnList } from './types';
import type { IdentifierQuoter } from '../dialect/sql-dialect';
import type { ParameterBinder } from '../params/parameter-binder';
import type { BoundParams } from '../types';

const COLUMN_SEPARATOR = /\s*,\s*/;

/**
 * Split 'a, b,c' into ['a', 'b', 'c']
 */
export function splitColumns(columns: string): string[] {
  return columns
    .trim()
    .split(COLUMN_SEPARATOR)
    .filter((column) => column !== '');
}

/**
 * Quote a column list given as a comma separated string or an array.
 * Columns containing a parenthesis are kept verbatim; a string containing
 * one is returned untouched.
 */
export function quoteColumnList(
  quoter: IdentifierQuoter,
  columns: ColumnList,
  binder?: ParameterBinder,
  params?: BoundParams,
): string {
  if (typeof columns === 'string' && columns.includes('(')) {
    return columns;
  }

  const list: ReadonlyArray<string | Expression> =
    typeof columns === 'string' ? splitColumns(columns) : columns;

  return list
    .map((column) => {
      if (column instanceof Expression) {
        return binder && params ? binder.merge(params, column) : column.text;
      }
      return column.includes('(') ? column : quoter.quoteColumnName(column);
    })
    .join(', ');
}
