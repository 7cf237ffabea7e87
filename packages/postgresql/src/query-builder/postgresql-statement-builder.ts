/**
 * PostgreSQL Statement Builder
 *
 * Multi-row INSERT and sequence reset. Integrity check toggling stays
 * unsupported: PostgreSQL has no session-wide switch for it.
 */

import { StatementBuilder, ValidationError } from '@sqlweave/core';

import type { BoundParams, QueryValue } from '@sqlweave/core';

export class PostgreSQLStatementBuilder extends StatementBuilder {
  override batchInsert(
    table: string,
    columns: readonly string[],
    rows: ReadonlyArray<readonly QueryValue[]>,
    params: BoundParams = {},
  ): string {
    return this.buildMultiRowInsert(table, columns, rows, params);
  }

  /**
   * Restart the serial sequence of a table, named `<table>_id_seq` by
   * PostgreSQL for a `serial` id column
   */
  override resetSequence(table: string, value = 1): string {
    if (!Number.isInteger(value) || value < 1) {
      throw new ValidationError(`Sequence value must be a positive integer, got ${value}`, 'value');
    }
    return `ALTER SEQUENCE ${this.dialect.quoteTableName(`${table}_id_seq`)} RESTART WITH ${value}`;
  }
}
