/**
 * MySQL Statement Builder
 *
 * Adds the statements MySQL has syntax for: multi-row INSERT,
 * AUTO_INCREMENT reset and FOREIGN_KEY_CHECKS toggling.
 */

import {
  ClauseBuilder,
  StatementBuilder,
  UnsupportedByDialectError,
  ValidationError,
  isCount,
} from '@sqlweave/core';

import type { BoundParams, QueryValue } from '@sqlweave/core';

/**
 * Largest unsigned BIGINT, used as "no limit" when only OFFSET is given
 */
export const MYSQL_UNLIMITED = '18446744073709551615';

/**
 * MySQL requires LIMIT before OFFSET
 */
export class MySQLClauseBuilder extends ClauseBuilder {
  override buildLimit(limit?: number | null, offset?: number | null): string {
    const noLimit = !isCount(limit) || limit < 0;
    if (noLimit && isCount(offset) && offset > 0) {
      return `LIMIT ${MYSQL_UNLIMITED} OFFSET ${Math.trunc(offset)}`;
    }
    return super.buildLimit(limit, offset);
  }
}

export class MySQLStatementBuilder extends StatementBuilder {
  protected override createClauseBuilder(): ClauseBuilder {
    return new MySQLClauseBuilder(this.dialect, this.conditions, this.binder);
  }

  override batchInsert(
    table: string,
    columns: readonly string[],
    rows: ReadonlyArray<readonly QueryValue[]>,
    params: BoundParams = {},
  ): string {
    return this.buildMultiRowInsert(table, columns, rows, params);
  }

  /**
   * Next AUTO_INCREMENT value of a table. The value is written inline since
   * MySQL takes no placeholder here, so it must be a positive integer.
   */
  override resetSequence(table: string, value = 1): string {
    if (!Number.isInteger(value) || value < 1) {
      throw new ValidationError(`Sequence value must be a positive integer, got ${value}`, 'value');
    }
    return `ALTER TABLE ${this.dialect.quoteTableName(table)} AUTO_INCREMENT=${value}`;
  }

  /**
   * MySQL toggles foreign key checks for the whole session only
   */
  override checkIntegrity(check = true, _schema = '', table = ''): string {
    if (table !== '') {
      throw new UnsupportedByDialectError(this.dialect.name, 'integrity check on a single table');
    }
    return `SET FOREIGN_KEY_CHECKS=${check ? 1 : 0}`;
  }
}
